/**
 * Timetable Parser
 *
 * Page: Attendance/TimeTable
 *
 * Portal structure:
 * - Grid table, one body row per day: <th>Monday</th> followed by period cells
 * - Empty periods hold "-" or nothing; labs span periods with colspan
 * - A class cell wraps its content in div.tooltip-wrapper:
 *   "G1 <b>20XT81</b> <span class="tooltip-text">Operating Systems</span>"
 */

import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import { periodRange } from '../calculators/timetableClock.js';
import { PageStructureError } from '../errors.js';
import type { TimetableEntry } from '../types.js';
import { logger } from '../utils/logger.js';
import { cleanText, strippedStrings } from './pageParser.js';
import type { PageParser } from './pageParser.js';

interface CellContent {
  courseCode: string;
  courseName: string;
  room: string;
  classInfo: string;
}

function colspanOf(cell: Cheerio<Element>): number {
  const span = parseInt(cell.attr('colspan') ?? '1', 10);
  return Number.isNaN(span) || span < 1 ? 1 : span;
}

function parseCell($: cheerio.CheerioAPI, cell: Cheerio<Element>): CellContent | null {
  const wrapper = cell.find('div.tooltip-wrapper').first();
  if (wrapper.length === 0) return null;

  const code = wrapper.find('b').first();
  const courseCode = cleanText(code.text());
  const courseName = cleanText(wrapper.find('span.tooltip-text').first().text());
  const room = cleanText(wrapper.find('.room').first().text());

  // Everything before the <b> is class/section info
  const info: string[] = [];
  for (const node of wrapper.contents().toArray()) {
    if (isTag(node) && (node.name === 'b' || $(node).find('b').length > 0)) break;
    info.push(...strippedStrings(node));
  }

  if (!courseCode && !courseName) return null;
  return { courseCode, courseName, room, classInfo: info.join(' ') };
}

function findGrid($: cheerio.CheerioAPI): Cheerio<Element> {
  for (const selector of ['table.timetable-table', 'table.table', 'table']) {
    const table = $<Element, string>(selector).first();
    if (table.length > 0) return table;
  }
  throw new PageStructureError('timetable', 'timetable grid not found');
}

export const timetableParser: PageParser<TimetableEntry[]> = {
  page: 'timetable',
  parse(html: string): TimetableEntry[] {
    const $ = cheerio.load(html);
    const table = findGrid($);
    const entries: TimetableEntry[] = [];

    table.find('tbody tr').each((rowIndex, row) => {
      const $row = $(row);
      const day = cleanText($row.find('th').first().text());
      const cells = $row.find('td');
      if (!day || cells.length === 0) {
        logger.debug('TimetableParser', `Row ${rowIndex} has no day header or periods, skipping`);
        return;
      }

      let period = 1;
      cells.each((_, td) => {
        const cell = $(td);
        const span = colspanOf(cell);
        const text = cleanText(cell.text());

        if (text !== '' && text !== '-') {
          const content = parseCell($, cell);
          const range = periodRange(period, span);
          if (content && range) {
            entries.push({
              day,
              period,
              periodSpan: span,
              startTime: range.start,
              endTime: range.end,
              ...content,
            });
          } else if (content) {
            logger.warn('TimetableParser', `${day} period ${period} is outside the bell schedule, skipping`);
          }
        }

        period += span;
      });
    });

    logger.debug('TimetableParser', `Parsed ${entries.length} timetable entries`);
    return entries;
  },
};
