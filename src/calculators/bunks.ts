/**
 * Bunk Calculator
 *
 * How many classes a student can skip and still sit at or above the minimum
 * attendance, and how many they must attend to climb back when below it.
 */

import type { SubjectAttendance } from '../types.js';

export const DEFAULT_MIN_ATTENDANCE = 75;

export type BunkStatus = 'below_minimum' | 'at_minimum' | 'safe';

export interface BunkReport {
  courseCode: string;
  presentHours: number;
  totalHours: number;
  absentHours: number;
  percentage: number;
  minAttendance: number;
  minRequiredPresentHours: number;
  availableBunks: number;
  classesToRecover: number | null;
  status: BunkStatus;
}

export interface BunkSummary {
  totalSubjects: number;
  totalAvailableBunks: number;
  subjectsBelowMinimum: number;
  subjectsSafeToBunk: number;
  minAttendance: number;
  averageBunksPerSubject: number;
}

function assertPercent(minPercent: number): void {
  if (!(minPercent > 0 && minPercent <= 100)) {
    throw new RangeError(`Minimum attendance must be in (0, 100], got ${minPercent}`);
  }
}

/**
 * Largest b with present / (total + b) >= minPercent / 100
 */
export function calculateAvailableBunks(present: number, total: number, minPercent = DEFAULT_MIN_ATTENDANCE): number {
  assertPercent(minPercent);
  if (total <= 0) return 0;
  return Math.max(0, Math.floor((present * 100) / minPercent) - total);
}

/**
 * Smallest k with (present + k) / (total + k) >= minPercent / 100.
 * 0 when already there; null when 100% is required and a class was missed.
 */
export function classesNeededToRecover(
  present: number,
  total: number,
  minPercent = DEFAULT_MIN_ATTENDANCE
): number | null {
  assertPercent(minPercent);
  const deficit = minPercent * total - 100 * present;
  if (total <= 0 || deficit <= 0) return 0;
  if (minPercent === 100) return null;
  return Math.ceil(deficit / (100 - minPercent));
}

export function bunkStatus(present: number, total: number, minPercent = DEFAULT_MIN_ATTENDANCE): BunkStatus {
  if (total > 0 && present * 100 < minPercent * total) return 'below_minimum';
  return calculateAvailableBunks(present, total, minPercent) > 0 ? 'safe' : 'at_minimum';
}

export function bunkReport(record: SubjectAttendance, minPercent = DEFAULT_MIN_ATTENDANCE): BunkReport {
  const present = record.presentHours;
  const total = record.totalHours;
  return {
    courseCode: record.courseCode,
    presentHours: present,
    totalHours: total,
    absentHours: record.absentHours,
    percentage: record.percentage,
    minAttendance: minPercent,
    minRequiredPresentHours: Math.round(((minPercent * total) / 100) * 100) / 100,
    availableBunks: calculateAvailableBunks(present, total, minPercent),
    classesToRecover: classesNeededToRecover(present, total, minPercent),
    status: bunkStatus(present, total, minPercent),
  };
}

export function summarizeBunks(reports: BunkReport[], minPercent = DEFAULT_MIN_ATTENDANCE): BunkSummary {
  const totalAvailableBunks = reports.reduce((sum, report) => sum + report.availableBunks, 0);
  return {
    totalSubjects: reports.length,
    totalAvailableBunks,
    subjectsBelowMinimum: reports.filter(report => report.status === 'below_minimum').length,
    subjectsSafeToBunk: reports.filter(report => report.availableBunks > 0).length,
    minAttendance: minPercent,
    averageBunksPerSubject:
      reports.length > 0 ? Math.round((totalAvailableBunks / reports.length) * 100) / 100 : 0,
  };
}
