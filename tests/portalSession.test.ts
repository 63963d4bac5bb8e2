import { describe, expect, it } from 'vitest';
import { AuthenticationError, NetworkError, PageStructureError, SessionExpiredError } from '../src/errors.js';
import { PortalSession } from '../src/scrapers/portalSession.js';
import { PORTAL_PAGES } from '../src/scrapers/portalScraper.js';
import { BASE_URL, FakePortal, createSession, fixture, manualClock } from './helpers/fakePortal.js';

describe('PortalSession login', () => {
  it('posts the upper-cased roll number, token and terms flag', async () => {
    const portal = new FakePortal();
    const session = createSession(portal);

    await session.login();

    expect(portal.loginPosts).toBe(1);
    expect(portal.lastLoginForm?.get('rollno')).toBe('21XT01');
    expect(portal.lastLoginForm?.get('__RequestVerificationToken')).toBe('test-csrf-token');
    expect(portal.lastLoginForm?.get('chkterms')).toBe('on');
    expect(session.getStats()).toMatchObject({ authenticated: true, logins: 1, loginInFlight: false });
  });

  it('treats the redirect to the menu page as success without following it', async () => {
    const portal = new FakePortal();

    await createSession(portal).login();

    expect(portal.requests).toEqual(['GET /studzone', 'POST /studzone']);
  });

  it('rejects bad credentials', async () => {
    const portal = new FakePortal();
    const session = createSession(portal, { password: 'wrong-secret' });

    await expect(session.login()).rejects.toBeInstanceOf(AuthenticationError);
    expect(session.getStats().authenticated).toBe(false);
  });

  it('reports a login page without the token as a structure problem', async () => {
    const portal = new FakePortal();
    portal.overrides.set('/studzone', () => new Response('<html><body>Down for maintenance</body></html>'));

    await expect(createSession(portal).login()).rejects.toBeInstanceOf(PageStructureError);
  });

  it('wraps transport failures', async () => {
    const session = new PortalSession({
      baseUrl: BASE_URL,
      credentials: { rollNumber: '21xt01', password: 'test-secret' },
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const error = await session.login().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty('message', `Portal unreachable (GET ${BASE_URL}): fetch failed`);
  });

  it('treats a 5xx as a network error', async () => {
    const portal = new FakePortal();
    portal.overrides.set('/studzone', () => new Response('oops', { status: 503 }));

    await expect(createSession(portal).login()).rejects.toMatchObject({ kind: 'network', status: 503 });
  });
});

describe('PortalSession requests', () => {
  it('logs in on first use and reuses the session', async () => {
    const portal = new FakePortal();
    const session = createSession(portal);

    const marks = await session.fetchPage(PORTAL_PAGES.marks);
    await session.fetchPage(PORTAL_PAGES.attendance);

    expect(marks).toBe(fixture('marks.html'));
    expect(portal.loginPosts).toBe(1);
  });

  it('shares one login between concurrent requests', async () => {
    const portal = new FakePortal();
    const session = createSession(portal);

    await Promise.all([
      session.fetchPage(PORTAL_PAGES.marks),
      session.fetchPage(PORTAL_PAGES.attendance),
      session.fetchPage(PORTAL_PAGES.timetable),
    ]);

    expect(portal.loginPosts).toBe(1);
  });

  it('re-authenticates exactly once when the portal drops the session', async () => {
    const portal = new FakePortal();
    const session = createSession(portal);
    await session.fetchPage(PORTAL_PAGES.marks);

    portal.expireSessions();
    const html = await session.fetchPage(PORTAL_PAGES.attendance);

    expect(html).toBe(fixture('attendance.html'));
    expect(portal.loginPosts).toBe(2);
  });

  it('gives up with SessionExpiredError when the retry is rejected too', async () => {
    const portal = new FakePortal();
    const session = createSession(portal);
    await session.login();

    portal.rejectAllSessions = true;
    await expect(session.fetchPage(PORTAL_PAGES.marks)).rejects.toBeInstanceOf(SessionExpiredError);
    expect(portal.loginPosts).toBe(2);
  });

  it('logs in again once the TTL has passed', async () => {
    const portal = new FakePortal();
    const clock = manualClock();
    const session = createSession(portal, { now: clock.now });

    await session.fetchPage(PORTAL_PAGES.marks);
    clock.advanceMinutes(29);
    await session.fetchPage(PORTAL_PAGES.marks);
    expect(portal.loginPosts).toBe(1);

    clock.advanceMinutes(2);
    expect(session.getStats().authenticated).toBe(false);
    await session.fetchPage(PORTAL_PAGES.marks);
    expect(portal.loginPosts).toBe(2);
  });

  it('surfaces 4xx pages as network errors', async () => {
    const portal = new FakePortal();
    const session = createSession(portal);

    await expect(session.fetchPage('Attendance/Missing')).rejects.toMatchObject({
      kind: 'network',
      status: 404,
      message: 'Attendance/Missing returned HTTP 404',
    });
  });

  it('drops a stale session only if it is still current', async () => {
    const portal = new FakePortal();
    const session = createSession(portal);
    const first = await session.ensureSession();
    await session.login();

    session.invalidate(first);
    expect(session.getStats().authenticated).toBe(true);

    session.invalidate();
    expect(session.getStats().authenticated).toBe(false);
  });
});
