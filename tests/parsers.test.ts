import { describe, expect, it } from 'vitest';
import { PageStructureError } from '../src/errors.js';
import { attendanceParser } from '../src/parsers/attendanceParser.js';
import { courseParser } from '../src/parsers/courseParser.js';
import { hasLoginForm, loginPageParser, looksSignedIn } from '../src/parsers/loginParser.js';
import { marksParser } from '../src/parsers/marksParser.js';
import { parseMark } from '../src/parsers/pageParser.js';
import { timetableParser } from '../src/parsers/timetableParser.js';
import { fixture } from './helpers/fakePortal.js';

describe('loginParser', () => {
  it('reads the antiforgery token', () => {
    expect(loginPageParser.parse(fixture('login.html'))).toEqual({ csrfToken: 'test-csrf-token' });
  });

  it('fails on a login page without a token', () => {
    expect(() => loginPageParser.parse('<html><body><form></form></body></html>')).toThrow(PageStructureError);
  });

  it('tells the login form from the signed-in menu', () => {
    expect(hasLoginForm(fixture('login.html'))).toBe(true);
    expect(hasLoginForm(fixture('menu.html'))).toBe(false);
    expect(looksSignedIn(fixture('menu.html'))).toBe(true);
    expect(looksSignedIn(fixture('login.html'))).toBe(false);
  });
});

describe('parseMark', () => {
  it('treats blank, * and junk as unpublished', () => {
    expect(parseMark('')).toBeNull();
    expect(parseMark(' * ')).toBeNull();
    expect(parseMark('AB')).toBeNull();
    expect(parseMark(' 18.5 ')).toBe(18.5);
  });
});

describe('marksParser', () => {
  const sheet = marksParser.parse(fixture('marks.html'));

  it('reads the lab table', () => {
    expect(sheet.lab).toEqual([
      {
        kind: 'lab',
        subjectCode: '20XT88',
        subjectName: 'Operating Systems Laboratory',
        ca1: 18.5,
        ca2: 19.0,
        total: 37.5,
        convertedTotal: 45,
      },
    ]);
  });

  it('reads theory rows and skips the footer row', () => {
    expect(sheet.theory.map(row => row.subjectCode)).toEqual(['20XT81', '20XT82']);
    expect(sheet.theory[0]).toEqual({
      kind: 'theory',
      subjectCode: '20XT81',
      subjectName: 'Operating Systems',
      test1: 24,
      test2: 26,
      retest: null,
      retest1: null,
      retest2: null,
      testTotal: 25,
      assignment: 7,
      tutorial: 10,
      total: 42,
      convertedTotal: 33.6,
    });
    expect(sheet.theory[1].test2).toBeNull();
  });

  it('fails when no marks table is present', () => {
    expect(() => marksParser.parse('<html><body><p>Maintenance</p></body></html>')).toThrow(
      'marks: no lab (LT1) or theory (T1) marks table found'
    );
  });
});

describe('attendanceParser', () => {
  it('reads one record per course', () => {
    const records = attendanceParser.parse(fixture('attendance.html'));
    expect(records).toHaveLength(3);
    expect(records[1]).toEqual({
      courseCode: '20XT82',
      totalHours: 36,
      exemptedHours: 0,
      absentHours: 10,
      presentHours: 26,
      percentage: 72.22,
      exemptionPercentage: 72.22,
      medicalExemptionPercentage: 72.22,
      from: '01-07-2025',
      to: '30-09-2025',
    });
  });

  it('skips short rows', () => {
    const html = `<table id="example"><tr><td>20XT81</td><td>40</td></tr>
      <tr><td>20XT82</td><td>10</td><td>0</td><td>2</td><td>8</td><td>80</td><td>80</td><td>80</td><td>a</td><td>b</td></tr></table>`;
    expect(attendanceParser.parse(html).map(r => r.courseCode)).toEqual(['20XT82']);
  });

  it('fails without the attendance table', () => {
    expect(() => attendanceParser.parse('<table class="table"></table>')).toThrow(PageStructureError);
  });
});

describe('timetableParser', () => {
  const entries = timetableParser.parse(fixture('timetable.html'));

  it('produces one entry per class cell', () => {
    expect(entries.map(e => `${e.day}:${e.period}:${e.courseCode}`)).toEqual([
      'Monday:1:20XT81',
      'Monday:2:20XT82',
      'Monday:5:20XT88',
      'Wednesday:3:20XT82',
      'Wednesday:7:20XT81',
    ]);
  });

  it('spans lab periods with colspan', () => {
    expect(entries[2]).toEqual({
      day: 'Monday',
      period: 5,
      periodSpan: 2,
      startTime: '13:40',
      endTime: '15:20',
      courseCode: '20XT88',
      courseName: 'Operating Systems Laboratory',
      room: '',
      classInfo: 'G1',
    });
  });

  it('maps periods to bell times', () => {
    expect(entries[4].startTime).toBe('15:30');
    expect(entries[4].endTime).toBe('16:20');
  });

  it('fails without a grid', () => {
    expect(() => timetableParser.parse('<html><body><p>No timetable</p></body></html>')).toThrow(PageStructureError);
  });
});

describe('courseParser', () => {
  it('reads cards and drops repeated codes', () => {
    const courses = courseParser.parse(fixture('courseplan.html'));
    expect(courses.map(c => c.code)).toEqual(['20XT81', '20XT82', '20XT88', '20XC14']);
    expect(courses[0]).toEqual({
      code: '20XT81',
      name: 'Operating Systems',
      description: 'Process management and memory.',
    });
    expect(courses[1].description).toBe('');
  });

  it('returns no courses for a rendered page without cards', () => {
    expect(courseParser.parse('<html><body><p>No courses registered</p></body></html>')).toEqual([]);
  });

  it('fails on an empty page', () => {
    expect(() => courseParser.parse('<html><body></body></html>')).toThrow(PageStructureError);
  });
});
