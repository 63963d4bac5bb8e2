import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, logger, parseLogLevel, redact } from '../src/utils/logger.js';
import { FakePortal, PASSWORD, createSession } from './helpers/fakePortal.js';

describe('redact', () => {
  it('masks credential fields at any depth', () => {
    expect(
      redact({
        form: { rollno: '21XT01', password: 'test-secret', __RequestVerificationToken: 'test-csrf-token' },
        headers: [{ Cookie: '.ASPXAUTH=session-1' }],
        attempt: 1,
      })
    ).toEqual({
      form: { rollno: '21XT01', password: '***', __RequestVerificationToken: '***' },
      headers: [{ Cookie: '***' }],
      attempt: 1,
    });
  });

  it('leaves plain values alone', () => {
    expect(redact('text')).toBe('text');
    expect(redact(null)).toBeNull();
  });
});

describe('parseLogLevel', () => {
  it('falls back to info', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('loud')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
  });
});

describe('logger', () => {
  let initialLevel: LogLevel;

  beforeEach(() => {
    initialLevel = logger.getLevel();
  });

  afterEach(() => {
    logger.setLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('takes its level from loaded settings', () => {
    logger.configure({ level: LogLevel.WARN, toFile: false });
    expect(logger.getLevel()).toBe(LogLevel.WARN);
  });

  it('never writes the password while logging in at debug level', async () => {
    const lines: string[] = [];
    vi.spyOn(process.stderr, 'write').mockImplementation(chunk => {
      lines.push(String(chunk));
      return true;
    });
    logger.setLevel(LogLevel.DEBUG);

    await createSession(new FakePortal()).login();

    expect(lines.some(line => line.includes('"password":"***"'))).toBe(true);
    expect(lines.filter(line => line.includes(PASSWORD))).toEqual([]);
  });
});
