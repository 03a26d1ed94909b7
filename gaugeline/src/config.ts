/**
 * Runtime configuration from environment variables.
 *
 * The CLI entry points load `.env` through dotenv before calling loadConfig().
 */
import { z } from 'zod';
import { FatalError } from './core/errors.js';
import type { DateRange } from './sources/nwis.js';

const DEFAULT_DATA_DIR = new URL('../data', import.meta.url).pathname;
const THREE_YEARS_MS = 3 * 365 * 24 * 60 * 60 * 1000;

const csv = z
  .string()
  .transform((s) => s.split(',').map((part) => part.trim()).filter(Boolean));

const isoDate = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'must be an ISO-8601 date' })
  .transform((s) => new Date(s));

const envSchema = z.object({
  NWIS_BASE_URL: z.string().url().default('https://waterservices.usgs.gov/nwis'),
  NWIS_API_KEY: z.string().min(1).optional(),
  NWIS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  NWIS_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
  NWIS_RETRY_BASE_MS: z.coerce.number().int().min(0).default(500),
  NWIS_RETRY_MAX_MS: z.coerce.number().int().min(0).default(30000),
  NWIS_REQUEST_INTERVAL_MS: z.coerce.number().int().min(0).default(200),
  NWIS_CONCURRENCY: z.coerce.number().int().min(1).default(8),
  NWIS_PARTITION_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  NWIS_SITES_PER_REQUEST: z.coerce.number().int().min(1).max(100).default(100),
  NWIS_WINDOW_DAYS: z.coerce.number().int().min(1).default(30),
  NWIS_PARAMETER_CODES: csv.default('00060,00065'),
  NWIS_SITE_TYPES: csv.default('ST'),
  NWIS_START_DATE: isoDate.optional(),
  NWIS_END_DATE: isoDate.optional(),
  GAUGELINE_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
  GAUGELINE_RESUME_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
});

export interface Config {
  baseUrl: string;
  apiKey: string | null;
  timeoutMs: number;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  requestIntervalMs: number;
  concurrency: number;
  partitionConcurrency: number;
  sitesPerRequest: number;
  windowDays: number;
  parameterCodes: string[];
  siteTypes: string[];
  dateRange: DateRange;
  dataDir: string;
  resumeMaxAgeHours: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  now: Date = new Date()
): Config {
  // blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new FatalError(`Invalid configuration:\n${problems}`);
  }
  const e = parsed.data;

  const end = e.NWIS_END_DATE ?? now;
  const start = e.NWIS_START_DATE ?? new Date(end.getTime() - THREE_YEARS_MS);
  if (start.getTime() > end.getTime()) {
    throw new FatalError(
      `Invalid configuration:\n  NWIS_START_DATE (${start.toISOString()}) is after NWIS_END_DATE (${end.toISOString()})`
    );
  }

  return {
    baseUrl: e.NWIS_BASE_URL.replace(/\/+$/, ''),
    apiKey: e.NWIS_API_KEY ?? null,
    timeoutMs: e.NWIS_TIMEOUT_MS,
    retry: {
      maxAttempts: e.NWIS_MAX_ATTEMPTS,
      baseDelayMs: e.NWIS_RETRY_BASE_MS,
      maxDelayMs: e.NWIS_RETRY_MAX_MS,
    },
    requestIntervalMs: e.NWIS_REQUEST_INTERVAL_MS,
    concurrency: e.NWIS_CONCURRENCY,
    partitionConcurrency: e.NWIS_PARTITION_CONCURRENCY,
    sitesPerRequest: e.NWIS_SITES_PER_REQUEST,
    windowDays: e.NWIS_WINDOW_DAYS,
    parameterCodes: e.NWIS_PARAMETER_CODES,
    // '*' keeps every site type
    siteTypes: e.NWIS_SITE_TYPES.includes('*') ? [] : e.NWIS_SITE_TYPES,
    dateRange: { start, end },
    dataDir: e.GAUGELINE_DATA_DIR,
    resumeMaxAgeHours: e.GAUGELINE_RESUME_MAX_AGE_HOURS,
  };
}
