/**
 * Configuration
 *
 * Credentials and server settings come from a JSON file (config.json by default),
 * with CAMPUS_* environment variables (or a .env file) taking precedence.
 * Blank variables count as unset. LOG_LEVEL and LOG_TO_FILE land in `logging`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LogLevel, parseLogLevel } from './utils/logger.js';

export const DEFAULT_PORTAL_URL = 'https://ecampus.psgtech.ac.in/studzone';

export const TRANSPORTS = ['stdio', 'sse'] as const;
export type Transport = (typeof TRANSPORTS)[number];

const fileSchema = z.object({
  credentials: z
    .object({
      roll_number: z.string().trim().min(1).optional(),
      password: z.string().min(1).optional(),
    })
    .default({}),
  server: z
    .object({
      host: z.string().min(1).optional(),
      port: z.coerce.number().int().min(1).max(65535).optional(),
      transport: z.enum(TRANSPORTS).optional(),
    })
    .default({}),
  portal: z
    .object({
      base_url: z.string().url().optional(),
      timeout_ms: z.number().int().positive().optional(),
      session_ttl_minutes: z.number().positive().optional(),
      cache_ttl_minutes: z.number().nonnegative().optional(),
    })
    .default({}),
});

const appConfigSchema = z.object({
  credentials: z.object({
    rollNumber: z.string({ required_error: 'roll number is required' }).min(1),
    password: z.string({ required_error: 'password is required' }).min(1),
  }),
  server: z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535),
    transport: z.enum(TRANSPORTS),
  }),
  portal: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    sessionTtlMinutes: z.number().positive(),
    cacheTtlMinutes: z.number().nonnegative(),
  }),
  logging: z.object({
    level: z.nativeEnum(LogLevel),
    toFile: z.boolean(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type Credentials = AppConfig['credentials'];
export type PortalOptions = AppConfig['portal'];
export type LoggingOptions = AppConfig['logging'];

export interface LoadConfigOptions {
  /** Path to the JSON config file. Defaults to CAMPUS_CONFIG or ./config.json */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Read a .env file underneath env. Defaults to true when env is not given. */
  loadDotenv?: boolean;
  /** Defaults to ./.env */
  envPath?: string;
}

/**
 * Variables from the .env file, overridden by the real environment
 */
function resolveEnv(options: LoadConfigOptions): NodeJS.ProcessEnv {
  const env = options.env ?? process.env;
  if (!(options.loadDotenv ?? options.env === undefined)) {
    return env;
  }
  const envPath = path.resolve(options.envPath ?? '.env');
  if (!fs.existsSync(envPath)) {
    return env;
  }
  return { ...parseDotenv(fs.readFileSync(envPath, 'utf8')), ...env };
}

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value && value.trim() !== '' ? value : undefined;
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  const raw = fs.readFileSync(configPath, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = resolveEnv(options);
  const configPath = path.resolve(options.configPath ?? fromEnv(env, 'CAMPUS_CONFIG') ?? 'config.json');

  const parsedFile = fileSchema.safeParse(readConfigFile(configPath));
  if (!parsedFile.success) {
    throw new ConfigError(`Invalid ${path.basename(configPath)}: ${formatIssues(parsedFile.error)}`);
  }
  const file = parsedFile.data;

  const candidate = {
    credentials: {
      rollNumber: fromEnv(env, 'CAMPUS_ROLL_NUMBER') ?? file.credentials.roll_number,
      password: fromEnv(env, 'CAMPUS_PASSWORD') ?? file.credentials.password,
    },
    server: {
      host: fromEnv(env, 'CAMPUS_HOST') ?? file.server.host ?? '127.0.0.1',
      port: fromEnv(env, 'CAMPUS_PORT') ?? file.server.port ?? 8080,
      transport: fromEnv(env, 'CAMPUS_TRANSPORT') ?? file.server.transport ?? 'sse',
    },
    portal: {
      baseUrl: fromEnv(env, 'CAMPUS_PORTAL_URL') ?? file.portal.base_url ?? DEFAULT_PORTAL_URL,
      timeoutMs: file.portal.timeout_ms ?? 30_000,
      sessionTtlMinutes: file.portal.session_ttl_minutes ?? 30,
      cacheTtlMinutes: file.portal.cache_ttl_minutes ?? 30,
    },
    logging: {
      level: parseLogLevel(fromEnv(env, 'LOG_LEVEL')),
      toFile: fromEnv(env, 'LOG_TO_FILE') === 'true',
    },
  };

  const result = appConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration (${configPath}): ${formatIssues(result.error)}`);
  }
  return result.data;
}
