import { describe, expect, it } from 'vitest';
import {
  currentBreak,
  currentPeriod,
  dayName,
  findNextClass,
  minutesBetween,
  nextBreak,
  normalizeDay,
  periodRange,
} from '../src/calculators/timetableClock.js';
import { timetableParser } from '../src/parsers/timetableParser.js';
import { fixture } from './helpers/fakePortal.js';

// 15 September 2025 is a Monday
const at = (day: number, hours: number, minutes: number) => new Date(2025, 8, day, hours, minutes);

describe('bell schedule', () => {
  it('finds the running period, treating ranges as half-open', () => {
    expect(currentPeriod(at(15, 9, 0))).toBe(1);
    expect(currentPeriod(at(15, 9, 20))).toBe(2);
    expect(currentPeriod(at(15, 10, 15))).toBe(-1);
    expect(currentPeriod(at(15, 18, 0))).toBe(0);
  });

  it('knows the current and next break', () => {
    expect(currentBreak(at(15, 12, 30))?.name).toBe('Lunch Break');
    expect(currentBreak(at(15, 9, 0))).toBeNull();
    expect(nextBreak(at(15, 9, 0))?.name).toBe('Morning Break');
    expect(nextBreak(at(15, 16, 0))).toBeNull();
  });

  it('spans consecutive periods', () => {
    expect(periodRange(5, 2)).toEqual({ start: '13:40', end: '15:20' });
    expect(periodRange(9)).toBeNull();
  });
});

describe('days', () => {
  it('names days Monday-first', () => {
    expect(dayName(at(15, 9, 0))).toBe('Monday');
    expect(dayName(at(21, 9, 0))).toBe('Sunday');
  });

  it('resolves loose day input', () => {
    const monday = at(15, 9, 0);
    expect(normalizeDay('wed', monday)).toBe('Wednesday');
    expect(normalizeDay('  FRIDAY ', monday)).toBe('Friday');
    expect(normalizeDay('today', monday)).toBe('Monday');
    expect(normalizeDay('tomorrow', at(21, 9, 0))).toBe('Monday');
    expect(normalizeDay('t', monday)).toBeNull();
    expect(normalizeDay('funday', monday)).toBeNull();
  });

  it('counts whole minutes between instants', () => {
    expect(minutesBetween(at(15, 9, 0), at(15, 9, 20))).toBe(20);
    expect(minutesBetween(at(15, 9, 20), at(15, 9, 0))).toBe(-20);
  });
});

describe('findNextClass', () => {
  const entries = timetableParser.parse(fixture('timetable.html'));

  it('skips the class already running', () => {
    const next = findNextClass(entries, at(15, 9, 0));
    expect(next?.entry.courseCode).toBe('20XT82');
    expect(next?.minutesUntil).toBe(20);
  });

  it('counts classes at the end of the current break', () => {
    const next = findNextClass(entries, at(15, 12, 30));
    expect(next?.entry.courseCode).toBe('20XT88');
    expect(next?.minutesUntil).toBe(70);
  });

  it('looks ahead to later days', () => {
    const next = findNextClass(entries, at(15, 17, 0));
    expect(next?.entry.day).toBe('Wednesday');
    expect(next?.entry.startTime).toBe('10:30');
    expect(next?.startsAt).toEqual(at(17, 10, 30));
  });

  it('wraps around the week', () => {
    const next = findNextClass(entries, at(19, 9, 0));
    expect(next?.entry.day).toBe('Monday');
    expect(next?.startsAt).toEqual(at(22, 8, 30));
  });

  it('returns null for an empty timetable', () => {
    expect(findNextClass([], at(15, 9, 0))).toBeNull();
  });
});
