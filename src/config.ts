import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  DB_FILE: z.string().min(1).default('data/ledger.db'),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(3000),
  DB_RETRY_ATTEMPTS: z.coerce.number().int().min(0).max(10).default(2),
  DB_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(50),
  DB_POOL_SIZE: z.coerce.number().int().min(1).default(4),
  DB_CONNECTION_MAX_AGE_MS: z.coerce.number().int().min(0).default(5 * 60_000),
  STARTING_CASH: z.string().regex(/^\d+(\.\d{1,2})?$/).default('10000.00'),
  TIMEZONE: z.string().min(1).default('America/New_York'),
  HOLIDAYS: z.string().optional(),
  HOLIDAYS_FILE: z.string().default('config/holidays.json'),
  MISSING_PRICE_POLICY: z.enum(['skip', 'defer']).default('skip'),
  BACKFILL_MIN_EXISTING_DAYS: z.coerce.number().int().min(0).optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
});

export type MissingPricePolicy = 'skip' | 'defer';
export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface DatabaseConfig {
  file: string;
  busyTimeoutMs: number;
  retryAttempts: number;
  retryBackoffMs: number;
  poolSize: number;
  connectionMaxAgeMs: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel: LogLevel;
  db: DatabaseConfig;
  startingCash: string;
  timezone: string;
  holidays: string[];
  missingPricePolicy: MissingPricePolicy;
  backfillMinExistingDays?: number;
  gemini: {
    apiKey?: string;
    model: string;
  };
}

const holidayFileSchema = z.array(isoDate);

function readHolidayFile(file: string): string[] {
  const resolved = path.resolve(process.cwd(), file);
  if (!fs.existsSync(resolved)) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Holiday file ${file} is not valid JSON: ${String(error)}`);
  }
  const result = holidayFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Holiday file ${file} must be an array of YYYY-MM-DD dates`);
  }
  return result.data;
}

function parseHolidayList(value: string): string[] {
  const dates = value
    .split(',')
    .map((d) => d.trim())
    .filter((d) => d.length > 0);
  const result = z.array(isoDate).safeParse(dates);
  if (!result.success) {
    throw new ConfigError('HOLIDAYS must be a comma separated list of YYYY-MM-DD dates');
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  const holidays = e.HOLIDAYS !== undefined ? parseHolidayList(e.HOLIDAYS) : readHolidayFile(e.HOLIDAYS_FILE);

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    db: {
      file: e.DB_FILE,
      busyTimeoutMs: e.DB_BUSY_TIMEOUT_MS,
      retryAttempts: e.DB_RETRY_ATTEMPTS,
      retryBackoffMs: e.DB_RETRY_BACKOFF_MS,
      poolSize: e.DB_POOL_SIZE,
      connectionMaxAgeMs: e.DB_CONNECTION_MAX_AGE_MS,
    },
    startingCash: e.STARTING_CASH,
    timezone: e.TIMEZONE,
    holidays,
    missingPricePolicy: e.MISSING_PRICE_POLICY,
    backfillMinExistingDays: e.BACKFILL_MIN_EXISTING_DAYS,
    gemini: {
      apiKey: e.GEMINI_API_KEY?.trim() || undefined,
      model: e.GEMINI_MODEL,
    },
  };
}
