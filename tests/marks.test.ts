import { describe, expect, it } from 'vitest';
import { allSubjects, findSubject, THEORY_MAX_MARKS } from '../src/calculators/marks.js';
import { marksParser } from '../src/parsers/marksParser.js';
import { fixture } from './helpers/fakePortal.js';

const subjects = allSubjects(marksParser.parse(fixture('marks.html')));

describe('allSubjects', () => {
  it('lists lab rows before theory rows', () => {
    expect(subjects.map(s => s.subjectCode)).toEqual(['20XT88', '20XT81', '20XT82']);
  });

  it('maps theory tests onto CA1/CA2', () => {
    expect(subjects[1]).toEqual({
      subjectCode: '20XT81',
      subjectName: 'Operating Systems',
      kind: 'theory',
      ca1: 24,
      ca2: 26,
      assignment: 7,
      tutorial: 10,
      total: 42,
      convertedTotal: 33.6,
      maxMarks: THEORY_MAX_MARKS,
    });
  });

  it('gives lab subjects no assignment or tutorial', () => {
    expect(subjects[0].assignment).toBeNull();
    expect(subjects[0].maxMarks.assignment).toBeNull();
    expect(subjects[0].maxMarks.convertedTotal).toBe(60);
  });
});

describe('findSubject', () => {
  it('prefers an exact name over a longer one containing it', () => {
    expect(findSubject(subjects, 'operating systems')?.subjectCode).toBe('20XT81');
  });

  it('matches codes ignoring case', () => {
    expect(findSubject(subjects, '20xt88')?.kind).toBe('lab');
  });

  it('falls back to substring', () => {
    expect(findSubject(subjects, 'network')?.subjectCode).toBe('20XT82');
  });

  it('returns undefined when nothing matches', () => {
    expect(findSubject(subjects, 'chemistry')).toBeUndefined();
    expect(findSubject(subjects, '  ')).toBeUndefined();
  });
});
