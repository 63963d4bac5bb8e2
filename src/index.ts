#!/usr/bin/env node
/**
 * Campus Portal MCP - Main Entry Point
 * Serves portal marks, attendance, timetable and course plan as MCP tools
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { TRANSPORTS, loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { toToolError } from './errors.js';
import type { ToolContext } from './mcp/tools/shared.js';
import { SERVER_INFO } from './mcp/tools/shared.js';
import { PortalScraper } from './scrapers/portalScraper.js';
import { startServer } from './server.js';
import { LogLevel, logger } from './utils/logger.js';

const SCRAPE_TARGETS = ['marks', 'attendance', 'timetable', 'courses'] as const;
type ScrapeTarget = (typeof SCRAPE_TARGETS)[number];

type ServeOptions = {
  config?: string;
  transport?: AppConfig['server']['transport'];
  host?: string;
  port?: number;
  verbose?: boolean;
};

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be between 1 and 65535.');
  }
  return port;
}

/**
 * Load config.json/.env and apply its logging settings; --verbose wins over LOG_LEVEL
 */
function loadAppConfig(): AppConfig {
  const globals = program.opts<ServeOptions>();
  const config = loadConfig({ configPath: globals.config });
  logger.configure(config.logging);
  if (globals.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  return config;
}

function createContext(config: AppConfig): ToolContext {
  return {
    scraper: PortalScraper.fromConfig(config),
    now: () => new Date(),
  };
}

async function scrape(scraper: PortalScraper, target: ScrapeTarget): Promise<unknown> {
  switch (target) {
    case 'marks':
      return scraper.getMarks();
    case 'attendance':
      return scraper.getAttendance();
    case 'timetable':
      return scraper.getTimetable();
    case 'courses':
      return scraper.getCourses();
  }
}

const program = new Command();

program
  .name(SERVER_INFO.name)
  .description('MCP server for college portal marks, attendance, timetable and course plan')
  .version(SERVER_INFO.version)
  .option('-c, --config <path>', 'Path to config.json')
  .option('-v, --verbose', 'Debug logging');

program
  .command('serve')
  .description('Start the MCP server')
  .addOption(new Option('-t, --transport <transport>', 'Transport to serve on').choices(TRANSPORTS))
  .option('-H, --host <host>', 'Host to bind (sse)')
  .option('-p, --port <port>', 'Port to listen on (sse)', parsePort)
  .action(async (options: ServeOptions) => {
    const loaded = loadAppConfig();
    const config: AppConfig = {
      ...loaded,
      server: {
        host: options.host ?? loaded.server.host,
        port: options.port ?? loaded.server.port,
        transport: options.transport ?? loaded.server.transport,
      },
    };

    logger.info('Main', `🚀 ${SERVER_INFO.name} v${SERVER_INFO.version} starting (${config.server.transport})`);
    const running = await startServer(config, createContext(config));

    const shutdown = (signal: string) => {
      logger.info('Main', `${signal} received, shutting down`);
      running
        .close()
        .catch(err => logger.error('Main', `Shutdown failed: ${toToolError(err).message}`))
        .finally(() => {
          logger.flush();
          process.exit(0);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('scrape')
  .description('Log in, scrape one page and print it as JSON')
  .addArgument(program.createArgument('<page>', 'Page to scrape').choices(SCRAPE_TARGETS))
  .action(async (page: ScrapeTarget) => {
    const config = loadAppConfig();
    const result = await scrape(PortalScraper.fromConfig(config), page);
    process.stdout.write(JSON.stringify(result, null, 2) + '\n');
  });

program
  .command('check')
  .description('Run the health cycle (login + marks page) and exit 0 when healthy')
  .action(async () => {
    const config = loadAppConfig();
    const report = await PortalScraper.fromConfig(config).checkHealth();
    logger.info('Main', `✅ Healthy: login ${report.loginMs}ms, fetch ${report.fetchMs}ms, ${report.subjects} subjects`);
  });

program.parseAsync().catch((err: unknown) => {
  const { kind, message } = toToolError(err);
  logger.error('Main', `❌ ${kind}: ${message}`);
  logger.flush();
  process.exitCode = 1;
});
