/**
 * CA Marks Parser
 *
 * Page: ContinuousAssessment/CAMarksView
 *
 * Portal structure:
 * - One `table.table` per course kind, two header rows (labels, then max marks)
 * - Lab table headers carry LT1/LT2 (read as CA1/CA2):
 *   COURSE CODE | COURSE TITLE | LT1 | LT2 | TOTAL | CONV. TOTAL
 * - Theory table headers carry T1/T2:
 *   COURSE CODE | COURSE TITLE | T1 | T2 | RT | RT1 | RT2 | TEST TOTAL | AP | MPT | TOTAL | CONV. TOTAL
 */

import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { PageStructureError } from '../errors.js';
import type { LabCourseMarks, MarksSheet, TheoryCourseMarks } from '../types.js';
import { logger } from '../utils/logger.js';
import { cleanText, parseMark } from './pageParser.js';
import type { PageParser } from './pageParser.js';

const LAB_COLUMNS = 6;
const THEORY_COLUMNS = 12;

function cellTexts($: cheerio.CheerioAPI, row: Cheerio<Element>): string[] {
  return row.find('td').toArray().map(cell => cleanText($(cell).text()));
}

function parseLabRow(cells: string[]): LabCourseMarks {
  return {
    kind: 'lab',
    subjectCode: cells[0],
    subjectName: cells[1],
    ca1: parseMark(cells[2]),
    ca2: parseMark(cells[3]),
    total: parseMark(cells[4]),
    convertedTotal: parseMark(cells[5]),
  };
}

function parseTheoryRow(cells: string[]): TheoryCourseMarks {
  return {
    kind: 'theory',
    subjectCode: cells[0],
    subjectName: cells[1],
    test1: parseMark(cells[2]),
    test2: parseMark(cells[3]),
    retest: parseMark(cells[4]),
    retest1: parseMark(cells[5]),
    retest2: parseMark(cells[6]),
    testTotal: parseMark(cells[7]),
    assignment: parseMark(cells[8]),
    tutorial: parseMark(cells[9]),
    total: parseMark(cells[10]),
    convertedTotal: parseMark(cells[11]),
  };
}

export const marksParser: PageParser<MarksSheet> = {
  page: 'marks',
  parse(html: string): MarksSheet {
    const $ = cheerio.load(html);
    const sheet: MarksSheet = { lab: [], theory: [] };
    let recognized = 0;

    $('table.table').each((_, table) => {
      const $table = $(table);
      const headers = $table.find('th').toArray().map(th => cleanText($(th).text()).toUpperCase());

      // LT1 contains T1, so the lab check goes first
      const kind = headers.some(h => h.includes('LT1'))
        ? 'lab'
        : headers.some(h => h.includes('T1'))
          ? 'theory'
          : null;
      if (!kind) return;
      recognized++;

      const minColumns = kind === 'lab' ? LAB_COLUMNS : THEORY_COLUMNS;
      $table.find('tr').each((_, row) => {
        const cells = cellTexts($, $(row));
        if (cells.length === 0) return; // header row
        if (cells.length < minColumns || cells[0] === '') {
          logger.debug('MarksParser', `Skipping ${kind} row with ${cells.length} cells`);
          return;
        }
        if (kind === 'lab') {
          sheet.lab.push(parseLabRow(cells));
        } else {
          sheet.theory.push(parseTheoryRow(cells));
        }
      });
    });

    if (recognized === 0) {
      throw new PageStructureError('marks', 'no lab (LT1) or theory (T1) marks table found');
    }

    logger.debug('MarksParser', `Parsed ${sheet.lab.length} lab and ${sheet.theory.length} theory courses`);
    return sheet;
  },
};
