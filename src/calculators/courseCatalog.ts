/**
 * Course Catalog
 * Lookup, search and statistics over the registered-course list
 */

import Fuse from 'fuse.js';
import type { CourseInfo } from '../types.js';

export interface CourseStatistics {
  totalCourses: number;
  departments: Record<string, number>;
  uniqueDepartments: number;
  averageCourseNameLength: number;
  averageCourseCodeLength: number;
}

export interface NameMatch {
  matches: CourseInfo[];
  /** How the matches were found; 'fuzzy' results are only suggestions */
  strategy: 'word' | 'substring' | 'fuzzy' | 'none';
}

const LAB_PATTERN = /\blab(oratory)?\b/i;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Department part of a course code: the letters inside it.
 * "20XT81" → "XT", "19Z601" → "Z", falling back to the first two characters.
 */
export function departmentCode(code: string): string {
  const letters = code.toUpperCase().match(/[A-Z]+/);
  return letters ? letters[0] : code.substring(0, 2).toUpperCase();
}

export function isLabCourse(course: CourseInfo): boolean {
  return LAB_PATTERN.test(course.name);
}

export function findCourseByCode(courses: CourseInfo[], code: string): CourseInfo | undefined {
  const wanted = code.trim().toUpperCase();
  return courses.find(course => course.code.toUpperCase() === wanted);
}

/**
 * Case-insensitive substring search over code and name
 */
export function searchCourses(courses: CourseInfo[], term: string): CourseInfo[] {
  const needle = term.trim().toLowerCase();
  if (!needle) return [...courses];
  return courses.filter(
    course => course.code.toLowerCase().includes(needle) || course.name.toLowerCase().includes(needle)
  );
}

export function coursesByDepartment(courses: CourseInfo[], department: string): CourseInfo[] {
  const wanted = department.trim().toUpperCase();
  return courses.filter(course => departmentCode(course.code) === wanted);
}

/**
 * Find courses by (part of) their name.
 * Whole-word hits win so "lab" does not match "syllabus"; then plain substring;
 * then fuzzy suggestions for typos.
 */
export function matchCoursesByName(courses: CourseInfo[], query: string): NameMatch {
  const needle = query.trim().toLowerCase();
  if (!needle) return { matches: [], strategy: 'none' };

  const word = new RegExp(`\\b${escapeRegExp(needle)}\\b`, 'i');
  const byWord = courses.filter(course => word.test(course.name));
  if (byWord.length > 0) return { matches: byWord, strategy: 'word' };

  const bySubstring = courses.filter(course => course.name.toLowerCase().includes(needle));
  if (bySubstring.length > 0) return { matches: bySubstring, strategy: 'substring' };

  const fuse = new Fuse(courses, {
    keys: ['name'],
    threshold: 0.4,
    ignoreLocation: true,
  });
  const fuzzy = fuse.search(needle, { limit: 5 }).map(result => result.item);
  return { matches: fuzzy, strategy: fuzzy.length > 0 ? 'fuzzy' : 'none' };
}

export function courseStatistics(courses: CourseInfo[]): CourseStatistics {
  if (courses.length === 0) {
    return {
      totalCourses: 0,
      departments: {},
      uniqueDepartments: 0,
      averageCourseNameLength: 0,
      averageCourseCodeLength: 0,
    };
  }

  const counts = new Map<string, number>();
  let nameLength = 0;
  let codeLength = 0;
  for (const course of courses) {
    const dept = departmentCode(course.code);
    counts.set(dept, (counts.get(dept) ?? 0) + 1);
    nameLength += course.name.length;
    codeLength += course.code.length;
  }

  const departments = Object.fromEntries([...counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
  return {
    totalCourses: courses.length,
    departments,
    uniqueDepartments: counts.size,
    averageCourseNameLength: round2(nameLength / courses.length),
    averageCourseCodeLength: round2(codeLength / courses.length),
  };
}
