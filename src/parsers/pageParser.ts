/**
 * Page Parser contract
 *
 * Everything that knows about portal markup lives behind this interface, so a
 * portal redesign touches src/parsers/ and nothing else.
 */

import type { CheerioAPI } from 'cheerio';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';

export type PortalPage = 'login' | 'marks' | 'attendance' | 'timetable' | 'courses';

export interface PageParser<T> {
  page: PortalPage;
  parse(html: string): T;
}

/**
 * Collapse whitespace the way a browser renders cell text
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parse a mark cell: blank and `*` mean "not published yet"
 */
export function parseMark(text: string): number | null {
  const value = cleanText(text);
  if (value === '' || value === '*') return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

/**
 * Parse an hour count; anything unreadable counts as 0
 */
export function parseCount(text: string): number {
  const num = parseInt(cleanText(text), 10);
  return Number.isNaN(num) ? 0 : num;
}

export function parsePercent(text: string): number {
  const num = parseFloat(cleanText(text).replace('%', ''));
  return Number.isNaN(num) ? 0 : num;
}

/**
 * Non-empty text fragments under a node, in document order
 */
export function strippedStrings(node: AnyNode): string[] {
  if (isText(node)) {
    const text = cleanText(node.data);
    return text ? [text] : [];
  }
  if (hasChildren(node)) {
    return node.children.flatMap(child => strippedStrings(child));
  }
  return [];
}

/**
 * Lower-cased visible text of the whole document
 */
export function pageText($: CheerioAPI): string {
  return cleanText($('body').text()).toLowerCase();
}
