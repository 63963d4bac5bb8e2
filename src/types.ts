/**
 * Portal Record Type Definitions
 */

// ============ Marks Types ============

export type CourseKind = 'lab' | 'theory';

/** A mark cell; null when blank, `*` or unparsable (not yet published). */
export type Mark = number | null;

export interface LabCourseMarks {
  kind: 'lab';
  subjectCode: string;
  subjectName: string;
  ca1: Mark;            // max 25
  ca2: Mark;            // max 25
  total: Mark;          // max 50
  convertedTotal: Mark; // max 60
}

export interface TheoryCourseMarks {
  kind: 'theory';
  subjectCode: string;
  subjectName: string;
  test1: Mark;          // T1, max 30
  test2: Mark;          // T2, max 30
  retest: Mark;         // RT
  retest1: Mark;        // RT1
  retest2: Mark;        // RT2
  testTotal: Mark;      // max 30
  assignment: Mark;     // AP, max 8
  tutorial: Mark;       // MPT, max 12
  total: Mark;          // max 50
  convertedTotal: Mark; // max 40
}

export type CourseMarks = LabCourseMarks | TheoryCourseMarks;

export interface MarksSheet {
  lab: LabCourseMarks[];
  theory: TheoryCourseMarks[];
}

export interface MaxMarks {
  ca1: number;
  ca2: number;
  assignment: number | null;
  tutorial: number | null;
  total: number;
  convertedTotal: number;
}

/** Normalized view over lab and theory rows. */
export interface SubjectMarks {
  subjectCode: string;
  subjectName: string;
  kind: CourseKind;
  ca1: Mark;
  ca2: Mark;
  assignment: Mark;
  tutorial: Mark;
  total: Mark;
  convertedTotal: Mark;
  maxMarks: MaxMarks;
}

// ============ Attendance Types ============

export interface SubjectAttendance {
  courseCode: string;
  totalHours: number;
  exemptedHours: number;
  absentHours: number;
  presentHours: number;
  percentage: number;
  exemptionPercentage: number;
  medicalExemptionPercentage: number;
  from: string;
  to: string;
}

// ============ Timetable Types ============

export const WEEK_DAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;
export type WeekDay = (typeof WEEK_DAYS)[number];

export interface TimetableEntry {
  day: string;          // as printed by the portal, e.g. "Monday"
  period: number;       // 1-8
  periodSpan: number;   // colspan, >1 for labs
  startTime: string;    // "08:30"
  endTime: string;      // "09:20"
  courseCode: string;
  courseName: string;
  room: string;
  classInfo: string;    // leading cell text, e.g. "G1"
}

// ============ Course Catalog Types ============

export interface CourseInfo {
  code: string;
  name: string;
  description: string;
}
