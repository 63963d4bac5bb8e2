/**
 * Portal Session
 *
 * Features:
 * - Form login with the antiforgery token, cookies kept in a per-session jar
 * - Session reuse until the TTL runs out or the portal bounces us to the login page
 * - One transparent re-login + retry when a request finds the session expired
 * - Concurrent callers share a single in-flight login
 */

import type { Credentials } from '../config.js';
import { AuthenticationError, NetworkError, PageStructureError, SessionExpiredError } from '../errors.js';
import { hasLoginForm, loginPageParser, looksSignedIn } from '../parsers/loginParser.js';
import { logger } from '../utils/logger.js';
import { mergeCookies, parseSetCookies } from './cookies.js';
import { PORTAL_PAGES } from './portalPages.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface PortalSessionOptions {
  baseUrl: string;
  credentials: Credentials;
  timeoutMs?: number;
  sessionTtlMinutes?: number;
  fetch?: FetchLike;
  now?: () => number;
}

interface CookieJar {
  header: string;
}

export interface ActiveSession {
  jar: CookieJar;
  authenticatedAt: number;
  expiresAt: number;
}

interface PortalResponse {
  status: number;
  url: string;
  location: string | null;
  body: string;
}

interface SendOptions {
  method?: 'GET' | 'POST';
  form?: Record<string, string>;
  followRedirects: boolean;
}

export interface SessionStats {
  authenticated: boolean;
  ageSeconds: number | null;
  expiresInSeconds: number | null;
  logins: number;
  loginInFlight: boolean;
}

const MAX_REDIRECTS = 5;

const BROWSER_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
};

export class PortalSession {
  private readonly baseUrl: string;
  private readonly credentials: Credentials;
  private readonly timeoutMs: number;
  private readonly ttlMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  private session: ActiveSession | null = null;
  private pendingLogin: Promise<ActiveSession> | null = null;
  private loginCount = 0;

  constructor(options: PortalSessionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.ttlMs = (options.sessionTtlMinutes ?? 30) * 60 * 1000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
  }

  get loginUrl(): string {
    return this.baseUrl;
  }

  urlFor(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
  }

  /**
   * Current session, logging in first if there is none or it has aged out
   */
  async ensureSession(): Promise<ActiveSession> {
    if (this.session && this.session.expiresAt > this.now()) {
      return this.session;
    }
    if (this.session) {
      logger.info('Session', 'Session TTL elapsed, logging in again');
      this.session = null;
    }
    if (!this.pendingLogin) {
      this.pendingLogin = this.performLogin().finally(() => {
        this.pendingLogin = null;
      });
    } else {
      logger.debug('Session', 'Waiting for in-flight login');
    }
    return this.pendingLogin;
  }

  /**
   * Force a fresh login, dropping the current session
   */
  async login(): Promise<void> {
    this.session = null;
    await this.ensureSession();
  }

  /**
   * Drop the session. With an argument, only if it is still the current one,
   * so a stale request cannot throw away a session another request just made.
   */
  invalidate(session?: ActiveSession): void {
    if (session && this.session !== session) return;
    if (this.session) {
      logger.info('Session', 'Session invalidated');
    }
    this.session = null;
  }

  /**
   * GET a portal page as an authenticated user
   */
  async fetchPage(path: string): Promise<string> {
    const url = this.urlFor(path);
    const session = await this.ensureSession();
    let response = await this.send(url, session.jar, { followRedirects: true });

    if (this.isExpired(response)) {
      logger.warn('Session', `Session expired while fetching ${path}, re-authenticating`);
      this.invalidate(session);
      const renewed = await this.ensureSession();
      response = await this.send(url, renewed.jar, { followRedirects: true });
      if (this.isExpired(response)) {
        this.invalidate(renewed);
        throw new SessionExpiredError(`Portal rejected the session for ${path} right after logging in`);
      }
    }

    if (response.status >= 400) {
      throw new NetworkError(`${path} returned HTTP ${response.status}`, { status: response.status });
    }
    return response.body;
  }

  getStats(): SessionStats {
    const now = this.now();
    const active = this.session && this.session.expiresAt > now ? this.session : null;
    return {
      authenticated: active !== null,
      ageSeconds: active ? Math.round((now - active.authenticatedAt) / 1000) : null,
      expiresInSeconds: active ? Math.round((active.expiresAt - now) / 1000) : null,
      logins: this.loginCount,
      loginInFlight: this.pendingLogin !== null,
    };
  }

  private async performLogin(): Promise<ActiveSession> {
    const rollNumber = this.credentials.rollNumber.toUpperCase();
    logger.info('Session', `Logging in as ${rollNumber.substring(0, 4)}***`);
    const jar: CookieJar = { header: '' };

    // Step 1: login page for the antiforgery token and initial cookies
    const loginPage = await this.send(this.loginUrl, jar, { followRedirects: true });
    if (loginPage.status >= 400) {
      throw new NetworkError(`Login page returned HTTP ${loginPage.status}`, { status: loginPage.status });
    }
    const { csrfToken } = loginPageParser.parse(loginPage.body);

    // Step 2: post credentials, redirects handled by hand to see where we land
    const form = {
      rollno: rollNumber,
      password: this.credentials.password,
      __RequestVerificationToken: csrfToken,
      chkterms: 'on',
    };
    let response = await this.send(loginPage.url, jar, { method: 'POST', form, followRedirects: false });

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(`Portal refused the login (HTTP ${response.status})`);
    }
    if (response.status >= 400) {
      throw new NetworkError(`Login returned HTTP ${response.status}`, { status: response.status });
    }

    // Step 3: verify
    if (response.location) {
      const target = new URL(response.location, response.url).toString();
      if (target.toLowerCase().includes(`/${PORTAL_PAGES.menu.toLowerCase()}`)) {
        return this.establish(jar);
      }
      if (this.isLoginUrl(target)) {
        throw new AuthenticationError('Login failed. Check your roll number and password.');
      }
      response = await this.send(target, jar, { followRedirects: true });
    }

    if (hasLoginForm(response.body)) {
      throw new AuthenticationError('Login failed. Check your roll number and password.');
    }
    if (!looksSignedIn(response.body)) {
      throw new PageStructureError('login', 'could not tell whether the login succeeded');
    }
    return this.establish(jar);
  }

  private establish(jar: CookieJar): ActiveSession {
    const now = this.now();
    const session: ActiveSession = { jar, authenticatedAt: now, expiresAt: now + this.ttlMs };
    this.session = session;
    this.loginCount++;
    logger.info('Session', 'Login successful');
    return session;
  }

  private isLoginUrl(url: string): boolean {
    const target = new URL(url);
    const base = new URL(this.loginUrl);
    const path = target.pathname.replace(/\/+$/, '').toLowerCase();
    return (
      path === base.pathname.replace(/\/+$/, '').toLowerCase() ||
      path.endsWith('/login') ||
      path.includes('/account/login')
    );
  }

  private isExpired(response: PortalResponse): boolean {
    if (response.status === 401 || response.status === 403) return true;
    if (response.location) {
      return this.isLoginUrl(new URL(response.location, response.url).toString());
    }
    return response.status < 300 && hasLoginForm(response.body);
  }

  /**
   * One HTTP exchange (plus redirects when asked), folding Set-Cookie into the jar.
   * Stops early on a redirect to the login page so callers can see it.
   */
  private async send(url: string, jar: CookieJar, options: SendOptions): Promise<PortalResponse> {
    let currentUrl = url;
    let method = options.method ?? 'GET';
    let body: string | undefined = options.form ? new URLSearchParams(options.form).toString() : undefined;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const headers: Record<string, string> = { ...BROWSER_HEADERS, Referer: this.loginUrl };
      if (jar.header) headers.Cookie = jar.header;
      if (body !== undefined) headers['Content-Type'] = 'application/x-www-form-urlencoded';

      logger.debug('HTTP', `${method} ${currentUrl}`, options.form ? { form: options.form } : undefined);

      let response: Response;
      try {
        response = await this.fetchImpl(currentUrl, {
          method,
          headers,
          body,
          redirect: 'manual',
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new NetworkError(`Portal unreachable (${method} ${currentUrl}): ${reason}`, { cause: err });
      }

      jar.header = mergeCookies(jar.header, parseSetCookies(response.headers));
      const text = await response.text();
      logger.debug('HTTP', `${response.status} ${currentUrl} (${text.length} bytes)`);

      if (response.status >= 500) {
        throw new NetworkError(`Portal error: ${method} ${currentUrl} returned HTTP ${response.status}`, {
          status: response.status,
        });
      }

      const location = response.status >= 300 && response.status < 400 ? response.headers.get('location') : null;
      if (!location || !options.followRedirects) {
        return { status: response.status, url: currentUrl, location, body: text };
      }

      const next = new URL(location, currentUrl).toString();
      if (this.isLoginUrl(next) && !this.isLoginUrl(currentUrl)) {
        return { status: response.status, url: currentUrl, location, body: text };
      }
      currentUrl = next;
      method = 'GET';
      body = undefined;
    }

    throw new NetworkError(`Too many redirects starting at ${url}`);
  }
}
