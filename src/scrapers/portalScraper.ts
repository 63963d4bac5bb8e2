/**
 * Portal Scraper
 *
 * Fetches a portal page through the session and hands it to its parser.
 * Timetable and course plan change once a semester, so they are cached;
 * marks and attendance are always fetched fresh.
 */

import type { AppConfig } from '../config.js';
import { attendanceParser } from '../parsers/attendanceParser.js';
import { courseParser } from '../parsers/courseParser.js';
import { marksParser } from '../parsers/marksParser.js';
import type { PageParser } from '../parsers/pageParser.js';
import { timetableParser } from '../parsers/timetableParser.js';
import type { CourseInfo, MarksSheet, SubjectAttendance, TimetableEntry } from '../types.js';
import { logger } from '../utils/logger.js';
import { PageCache } from './pageCache.js';
import { PORTAL_PAGES } from './portalPages.js';
import type { CacheStats } from './pageCache.js';
import { PortalSession } from './portalSession.js';
import type { FetchLike, SessionStats } from './portalSession.js';

export { PORTAL_PAGES };

export interface PortalScraperOptions {
  cacheTtlMinutes?: number;
  now?: () => number;
}

export interface HealthReport {
  loginMs: number;
  fetchMs: number;
  subjects: number;
  session: SessionStats;
}

export interface ScraperStats {
  session: SessionStats;
  caches: CacheStats[];
}

export class PortalScraper {
  private readonly timetableCache: PageCache<TimetableEntry[]>;
  private readonly courseCache: PageCache<CourseInfo[]>;
  private readonly now: () => number;

  constructor(
    readonly session: PortalSession,
    options: PortalScraperOptions = {}
  ) {
    const ttlMs = (options.cacheTtlMinutes ?? 30) * 60 * 1000;
    this.now = options.now ?? Date.now;
    this.timetableCache = new PageCache('timetable', ttlMs, this.now);
    this.courseCache = new PageCache('courses', ttlMs, this.now);
  }

  static fromConfig(config: AppConfig, fetch?: FetchLike): PortalScraper {
    const session = new PortalSession({
      baseUrl: config.portal.baseUrl,
      credentials: config.credentials,
      timeoutMs: config.portal.timeoutMs,
      sessionTtlMinutes: config.portal.sessionTtlMinutes,
      fetch,
    });
    return new PortalScraper(session, { cacheTtlMinutes: config.portal.cacheTtlMinutes });
  }

  async getMarks(): Promise<MarksSheet> {
    return this.scrape(PORTAL_PAGES.marks, marksParser);
  }

  async getAttendance(): Promise<SubjectAttendance[]> {
    return this.scrape(PORTAL_PAGES.attendance, attendanceParser);
  }

  async getTimetable(): Promise<TimetableEntry[]> {
    return this.timetableCache.get(() => this.scrape(PORTAL_PAGES.timetable, timetableParser));
  }

  async getCourses(): Promise<CourseInfo[]> {
    return this.courseCache.get(() => this.scrape(PORTAL_PAGES.courses, courseParser));
  }

  /**
   * Drop the cached course plan and fetch it again
   */
  async refreshCourses(): Promise<CourseInfo[]> {
    this.courseCache.clear();
    return this.getCourses();
  }

  /**
   * Full cycle: fresh login, then fetch and parse the marks page
   */
  async checkHealth(): Promise<HealthReport> {
    const started = this.now();
    await this.session.login();
    const loggedIn = this.now();
    const sheet = await this.getMarks();
    const finished = this.now();

    return {
      loginMs: loggedIn - started,
      fetchMs: finished - loggedIn,
      subjects: sheet.lab.length + sheet.theory.length,
      session: this.session.getStats(),
    };
  }

  getStats(): ScraperStats {
    return {
      session: this.session.getStats(),
      caches: [this.timetableCache.getStats(), this.courseCache.getStats()],
    };
  }

  private async scrape<T>(path: string, parser: PageParser<T>): Promise<T> {
    const started = this.now();
    const html = await this.session.fetchPage(path);
    const result = parser.parse(html);
    logger.info('Scraper', `Scraped ${parser.page} in ${this.now() - started}ms`);
    return result;
  }
}
