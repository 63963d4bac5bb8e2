/**
 * Marks helpers: one normalized shape over lab and theory rows, and subject lookup
 */

import type { CourseMarks, MarksSheet, MaxMarks, SubjectMarks } from '../types.js';

export const LAB_MAX_MARKS: MaxMarks = {
  ca1: 25,
  ca2: 25,
  assignment: null,
  tutorial: null,
  total: 50,
  convertedTotal: 60,
};

export const THEORY_MAX_MARKS: MaxMarks = {
  ca1: 30,
  ca2: 30,
  assignment: 8,
  tutorial: 12,
  total: 50,
  convertedTotal: 40,
};

export function toSubjectMarks(course: CourseMarks): SubjectMarks {
  if (course.kind === 'lab') {
    return {
      subjectCode: course.subjectCode,
      subjectName: course.subjectName,
      kind: 'lab',
      ca1: course.ca1,
      ca2: course.ca2,
      assignment: null,
      tutorial: null,
      total: course.total,
      convertedTotal: course.convertedTotal,
      maxMarks: LAB_MAX_MARKS,
    };
  }
  return {
    subjectCode: course.subjectCode,
    subjectName: course.subjectName,
    kind: 'theory',
    ca1: course.test1,
    ca2: course.test2,
    assignment: course.assignment,
    tutorial: course.tutorial,
    total: course.total,
    convertedTotal: course.convertedTotal,
    maxMarks: THEORY_MAX_MARKS,
  };
}

/** Lab rows first, then theory, in page order */
export function allSubjects(sheet: MarksSheet): SubjectMarks[] {
  return [...sheet.lab, ...sheet.theory].map(toSubjectMarks);
}

/**
 * Match by code or name: exact (case-insensitive) first, then substring
 */
export function findSubject<T extends { subjectCode: string; subjectName: string }>(
  subjects: T[],
  query: string
): T | undefined {
  const needle = query.trim().toLowerCase();
  if (!needle) return undefined;
  const exact = subjects.find(
    s => s.subjectCode.toLowerCase() === needle || s.subjectName.toLowerCase() === needle
  );
  if (exact) return exact;
  return subjects.find(
    s => s.subjectCode.toLowerCase().includes(needle) || s.subjectName.toLowerCase().includes(needle)
  );
}
