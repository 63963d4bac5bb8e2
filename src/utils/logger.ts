/**
 * Portal Logger - leveled, component-tagged logging with colors and optional file output.
 *
 * Everything goes to stderr: under the stdio transport, stdout carries the MCP protocol.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  data?: unknown;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.SILENT]: (text) => text,
};

const SECRET_KEYS = /pass(word)?|token|cookie|secret/i;

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? '').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Mask credential-like fields before they reach a log line.
 */
export function redact(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(redact);
  if (data && typeof data === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = SECRET_KEYS.test(key) ? '***' : redact(value);
    }
    return out;
  }
  return data;
}

class Logger {
  private minLevel: LogLevel;
  private logDir: string;
  private logFile: string | null = null;
  private logBuffer: LogEntry[] = [];

  constructor() {
    this.minLevel = parseLogLevel(process.env.LOG_LEVEL);
    this.logDir = path.join(process.cwd(), 'logs');
    if (process.env.LOG_TO_FILE === 'true') {
      this.startSession('campus-mcp');
    }
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Apply settings loaded after startup, e.g. from a .env file
   */
  configure(options: { level: LogLevel; toFile: boolean }): void {
    this.minLevel = options.level;
    if (options.toFile && !this.logFile) {
      this.startSession('campus-mcp');
    }
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Start writing a timestamped log file under logs/
   */
  startSession(name: string): void {
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(this.logDir, `${name}-${stamp}.log`);
    this.logBuffer = [];
    this.info('Logger', `Session started: ${this.logFile}`);
  }

  private formatTime(): string {
    return new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
  }

  private log(level: LogLevel, component: string, message: string, data?: unknown): void {
    if (level < this.minLevel) return;

    const timestamp = this.formatTime();
    const levelName = LEVEL_NAMES[level];
    const safeData = data === undefined ? undefined : redact(data);

    const prefix = `${chalk.dim(timestamp)} ${LEVEL_COLORS[level](levelName.padEnd(5))}`;
    process.stderr.write(`${prefix} ${chalk.cyan(`[${component}]`)} ${message}\n`);

    if (safeData !== undefined && this.minLevel === LogLevel.DEBUG) {
      process.stderr.write(chalk.dim(`  └─ ${JSON.stringify(safeData)}`) + '\n');
    }

    if (this.logFile) {
      this.logBuffer.push({ timestamp, level: levelName, component, message, data: safeData });
      if (level >= LogLevel.WARN || this.logBuffer.length >= 50) this.flush();
    }
  }

  debug(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  /**
   * Flush log buffer to file
   */
  flush(): void {
    if (this.logFile && this.logBuffer.length > 0) {
      const content = this.logBuffer
        .map(entry =>
          `${entry.timestamp} [${entry.level}] [${entry.component}] ${entry.message}${entry.data !== undefined ? ' ' + JSON.stringify(entry.data) : ''}`
        )
        .join('\n');
      fs.appendFileSync(this.logFile, content + '\n');
      this.logBuffer = [];
    }
  }
}

// Singleton instance
export const logger = new Logger();
