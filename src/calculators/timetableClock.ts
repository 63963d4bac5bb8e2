/**
 * Timetable Clock
 *
 * The college bell schedule and the time arithmetic the timetable tools need.
 * Times are "HH:MM" strings in the server's local time.
 */

import { WEEK_DAYS } from '../types.js';
import type { TimetableEntry, WeekDay } from '../types.js';

export interface TimeRange {
  start: string;
  end: string;
}

export interface BreakSlot extends TimeRange {
  name: string;
}

export const PERIOD_TIMES: Readonly<Record<number, TimeRange>> = {
  1: { start: '08:30', end: '09:20' },
  2: { start: '09:20', end: '10:10' },
  3: { start: '10:30', end: '11:20' },
  4: { start: '11:20', end: '12:10' },
  5: { start: '13:40', end: '14:30' },
  6: { start: '14:30', end: '15:20' },
  7: { start: '15:30', end: '16:20' },
  8: { start: '16:20', end: '17:10' },
};

export const BREAKS: readonly BreakSlot[] = [
  { name: 'Morning Break', start: '10:10', end: '10:30' },
  { name: 'Lunch Break', start: '12:10', end: '13:40' },
  { name: 'Afternoon Break', start: '15:20', end: '15:30' },
];

export function toMinutes(hhmm: string): number {
  const [h, m] = hhmm.split(':').map(part => parseInt(part, 10));
  return h * 60 + m;
}

export function formatClock(date: Date): string {
  return `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`;
}

export function minutesOfDay(date: Date): number {
  return date.getHours() * 60 + date.getMinutes();
}

/**
 * Time range covered by `span` periods starting at `period`
 */
export function periodRange(period: number, span = 1): TimeRange | null {
  const first = PERIOD_TIMES[period];
  if (!first) return null;
  const last = PERIOD_TIMES[period + span - 1] ?? first;
  return { start: first.start, end: last.end };
}

export function dayName(date: Date): WeekDay {
  // getDay(): 0 = Sunday
  return WEEK_DAYS[(date.getDay() + 6) % 7];
}

/**
 * Resolve loose day input ("mon", "TUESDAY", "thu", "today", "tomorrow")
 */
export function normalizeDay(input: string, now: Date): WeekDay | null {
  const value = input.trim().toLowerCase();
  if (value === 'today') return dayName(now);
  if (value === 'tomorrow') return dayName(new Date(now.getTime() + 24 * 60 * 60 * 1000));
  if (value.length < 2) return null;
  return WEEK_DAYS.find(day => day.toLowerCase().startsWith(value)) ?? null;
}

export function isSameDay(entryDay: string, day: WeekDay): boolean {
  return entryDay.trim().toLowerCase() === day.toLowerCase();
}

/** 1-8 while a period runs, -1 during a break, 0 outside college hours */
export function currentPeriod(now: Date): number {
  const minutes = minutesOfDay(now);
  if (currentBreak(now)) return -1;
  for (const [period, range] of Object.entries(PERIOD_TIMES)) {
    if (toMinutes(range.start) <= minutes && minutes < toMinutes(range.end)) {
      return Number(period);
    }
  }
  return 0;
}

export function currentBreak(now: Date): BreakSlot | null {
  const minutes = minutesOfDay(now);
  return BREAKS.find(b => toMinutes(b.start) <= minutes && minutes < toMinutes(b.end)) ?? null;
}

export function nextBreak(now: Date): BreakSlot | null {
  const minutes = minutesOfDay(now);
  return BREAKS.find(b => toMinutes(b.start) > minutes) ?? null;
}

/** Whole minutes from `from` to `to`, negative when `to` is earlier */
export function minutesBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / 60_000);
}

export function breakDuration(slot: TimeRange): number {
  return toMinutes(slot.end) - toMinutes(slot.start);
}

export function sortByStart(entries: TimetableEntry[]): TimetableEntry[] {
  return [...entries].sort((a, b) => toMinutes(a.startTime) - toMinutes(b.startTime));
}

export function entriesForDay(entries: TimetableEntry[], day: WeekDay): TimetableEntry[] {
  return sortByStart(entries.filter(entry => isSameDay(entry.day, day)));
}

export interface NextClass {
  entry: TimetableEntry;
  startsAt: Date;
  minutesUntil: number;
}

/**
 * First class that starts after `now`, looking through the rest of today and
 * then up to a week ahead. During a break, classes starting at the break's end count.
 */
export function findNextClass(entries: TimetableEntry[], now: Date): NextClass | null {
  const nowMinutes = minutesOfDay(now);
  const activeBreak = currentBreak(now);
  const threshold = activeBreak ? toMinutes(activeBreak.end) : nowMinutes + 1;

  for (let offset = 0; offset <= 7; offset++) {
    const date = new Date(now.getFullYear(), now.getMonth(), now.getDate() + offset);
    const candidates = entriesForDay(entries, dayName(date)).filter(
      entry => offset > 0 || toMinutes(entry.startTime) >= threshold
    );
    if (candidates.length > 0) {
      const entry = candidates[0];
      const startsAt = new Date(date);
      const start = toMinutes(entry.startTime);
      startsAt.setHours(Math.floor(start / 60), start % 60, 0, 0);
      return {
        entry,
        startsAt,
        minutesUntil: minutesBetween(now, startsAt),
      };
    }
  }
  return null;
}
