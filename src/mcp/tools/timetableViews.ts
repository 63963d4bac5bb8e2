/**
 * Timetable views shared by the schedule tools
 */

import { entriesForDay, toMinutes } from '../../calculators/timetableClock.js';
import type { TimetableEntry, WeekDay } from '../../types.js';

export interface DaySchedule {
  day: WeekDay;
  classes: TimetableEntry[];
  totalClasses: number;
  firstClassStarts: string | null;
  lastClassEnds: string | null;
}

export function daySchedule(entries: TimetableEntry[], day: WeekDay): DaySchedule {
  const classes = entriesForDay(entries, day);
  const ends = classes.map(entry => entry.endTime).sort((a, b) => toMinutes(a) - toMinutes(b));
  return {
    day,
    classes,
    totalClasses: classes.length,
    firstClassStarts: classes.length > 0 ? classes[0].startTime : null,
    lastClassEnds: ends.length > 0 ? ends[ends.length - 1] : null,
  };
}
