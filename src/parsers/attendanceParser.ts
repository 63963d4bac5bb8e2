/**
 * Attendance Parser
 *
 * Page: Attendance/StudentPercentage
 * Table `#example`, one row per course:
 * Course Code | Total Hours | Exemption Hours | Total Absent | Total Present |
 * Percentage | % With Exemption | % With Exemp. Med. | Attendance From | Attendance To
 */

import * as cheerio from 'cheerio';
import { PageStructureError } from '../errors.js';
import type { SubjectAttendance } from '../types.js';
import { logger } from '../utils/logger.js';
import { cleanText, parseCount, parsePercent } from './pageParser.js';
import type { PageParser } from './pageParser.js';

const ATTENDANCE_COLUMNS = 10;

export const attendanceParser: PageParser<SubjectAttendance[]> = {
  page: 'attendance',
  parse(html: string): SubjectAttendance[] {
    const $ = cheerio.load(html);
    const table = $('table#example').first();
    if (table.length === 0) {
      throw new PageStructureError('attendance', 'attendance table #example not found');
    }

    const records: SubjectAttendance[] = [];
    table.find('tr').each((_, row) => {
      const cells = $(row).find('td').toArray().map(cell => cleanText($(cell).text()));
      if (cells.length === 0) return;
      if (cells.length < ATTENDANCE_COLUMNS) {
        logger.warn('AttendanceParser', `Row has only ${cells.length} columns, expected ${ATTENDANCE_COLUMNS}`);
        return;
      }

      records.push({
        courseCode: cells[0],
        totalHours: parseCount(cells[1]),
        exemptedHours: parseCount(cells[2]),
        absentHours: parseCount(cells[3]),
        presentHours: parseCount(cells[4]),
        percentage: parsePercent(cells[5]),
        exemptionPercentage: parsePercent(cells[6]),
        medicalExemptionPercentage: parsePercent(cells[7]),
        from: cells[8],
        to: cells[9],
      });
    });

    logger.debug('AttendanceParser', `Parsed ${records.length} attendance records`);
    return records;
  },
};
