/**
 * Portal page paths, relative to the portal base URL
 */
export const PORTAL_PAGES = {
  menu: 'Home/Menu',
  marks: 'ContinuousAssessment/CAMarksView',
  attendance: 'Attendance/StudentPercentage',
  timetable: 'Attendance/TimeTable',
  courses: 'Attendance/courseplan',
} as const;
