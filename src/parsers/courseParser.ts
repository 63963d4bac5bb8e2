/**
 * Course Plan Parser
 *
 * Page: Attendance/courseplan
 * One div.card per registered course; its text reads code, title, then any
 * description lines. Cards repeat across semesters, so codes are deduplicated.
 */

import * as cheerio from 'cheerio';
import { PageStructureError } from '../errors.js';
import type { CourseInfo } from '../types.js';
import { logger } from '../utils/logger.js';
import { pageText, strippedStrings } from './pageParser.js';
import type { PageParser } from './pageParser.js';

export const courseParser: PageParser<CourseInfo[]> = {
  page: 'courses',
  parse(html: string): CourseInfo[] {
    const $ = cheerio.load(html);
    const cards = $('div.card');
    if (cards.length === 0) {
      // A rendered portal page with no cards just means no courses registered yet
      if (pageText($) === '') {
        throw new PageStructureError('courses', 'course plan page has no content');
      }
      logger.warn('CourseParser', 'No course cards (div.card) on the course plan page');
      return [];
    }

    const courses = new Map<string, CourseInfo>();
    cards.each((_, card) => {
      const items = strippedStrings(card);
      if (items.length < 2) return;
      const [code, name, ...rest] = items;
      courses.set(code, { code, name, description: rest.join(' ') });
    });

    logger.debug('CourseParser', `Parsed ${courses.size} unique courses from ${cards.length} cards`);
    return Array.from(courses.values());
  },
};
