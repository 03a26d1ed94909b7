/**
 * Client for the USGS NWIS water services.
 *
 * Site service:  {base}/site/?format=rdb&stateCd=XX
 * IV service:    {base}/iv/?format=json&sites=a,b&parameterCd=..&startDT=..&endDT=..
 *
 * Both are paged lazily: site lists one state per request, readings one date
 * window per request for each batch of sites.
 */
import { z } from 'zod';
import { PermanentError, errorMessage } from '../core/errors.js';
import { fetchText, paginate, type HttpOptions } from '../core/fetcher.js';
import { parseRdb, type RdbRecord } from '../core/rdb.js';
import type { RateLimiter } from '../core/rate-limiter.js';
import type { RetryPolicy } from '../core/retry.js';
import { US_STATES } from '../registry/states.js';
import { DEFAULT_PARAMETER_CODES, type Reading } from '../schemas/reading.js';

// ============================================================================
// Types
// ============================================================================

export interface DateRange {
  start: Date;
  end: Date;
}

export interface ReadingQuery {
  /** Omit for the most recent values only. */
  dateRange?: DateRange | null;
  parameterCodes?: readonly string[];
}

export interface NwisClientOptions {
  baseUrl?: string;
  apiKey?: string | null;
  timeoutMs?: number;
  limiter?: RateLimiter;
  retry?: RetryPolicy;
  /** Service ceiling on sites per IV request. */
  sitesPerRequest?: number;
  windowDays?: number;
  sleep?: HttpOptions['sleep'];
  onRetry?: HttpOptions['onRetry'];
}

/** One RDB site row tagged with the state it was requested for. */
export interface SiteRecord {
  state: string;
  fields: RdbRecord;
}

export interface SitePage {
  state: string;
  records: SiteRecord[];
  /** Set when the state failed permanently; records is then empty. */
  error?: string;
}

export interface SiteFetchResult {
  records: SiteRecord[];
  failedStates: Array<{ state: string; error: string }>;
}

export interface ReadingPage {
  window: DateRange | null;
  readings: Reading[];
  attempts: number;
}

export interface ReadingBatchResult {
  readings: Reading[];
  requests: number;
  attempts: number;
}

export const DEFAULT_BASE_URL = 'https://waterservices.usgs.gov/nwis';
export const MAX_SITES_PER_REQUEST = 100;
const DAY_MS = 24 * 60 * 60 * 1000;
const NO_DATA_VALUE = -999999;

// ============================================================================
// Helpers
// ============================================================================

export function formatDateTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Split a range into consecutive windows of `windowDays`. Neighbouring
 * windows share their boundary instant since the service treats both ends as
 * inclusive; the collector's dedupe absorbs the overlap.
 */
export function dateWindows(range: DateRange, windowDays: number): DateRange[] {
  if (windowDays <= 0) {
    throw new RangeError(`windowDays must be positive, got ${windowDays}`);
  }
  const step = windowDays * DAY_MS;
  const endMs = range.end.getTime();
  const windows: DateRange[] = [];

  let startMs = range.start.getTime();
  for (;;) {
    const windowEnd = Math.min(startMs + step, endMs);
    windows.push({ start: new Date(startMs), end: new Date(windowEnd) });
    if (windowEnd >= endMs) break;
    startMs = windowEnd;
  }
  return windows;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) {
    throw new RangeError(`chunk size must be positive, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ============================================================================
// IV payload
// ============================================================================

const codeList = z.array(z.object({ value: z.string() })).min(1);

const ivPayloadSchema = z.object({
  value: z.object({
    timeSeries: z
      .array(
        z.object({
          sourceInfo: z.object({ siteCode: codeList }),
          variable: z.object({
            variableCode: codeList,
            variableName: z.string().default(''),
            unit: z.object({ unitCode: z.string().optional() }).default({}),
            noDataValue: z.number().nullish(),
          }),
          values: z
            .array(
              z.object({
                value: z
                  .array(
                    z.object({
                      value: z.string().nullish(),
                      qualifiers: z.array(z.string()).default([]),
                      dateTime: z.string(),
                    })
                  )
                  .default([]),
              })
            )
            .default([]),
        })
      )
      .default([]),
  }),
});

function parseValue(raw: string | null | undefined, noData: number): number | null {
  if (raw === null || raw === undefined || raw.trim() === '') return null;
  const num = Number(raw);
  if (!Number.isFinite(num) || num === noData) return null;
  return num;
}

/**
 * Flatten an IV JSON payload into readings, in the order the service sent
 * them. Points outside `range` are dropped.
 */
export function parseIvPayload(
  body: string,
  url: string,
  range: DateRange | null = null
): Reading[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new PermanentError(`Malformed IV payload: ${errorMessage(err)}`, url, null, { cause: err });
  }

  const parsed = ivPayloadSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PermanentError(
      `Malformed IV payload at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`,
      url
    );
  }

  const readings: Reading[] = [];
  for (const ts of parsed.data.value.timeSeries) {
    const siteNo = ts.sourceInfo.siteCode[0].value;
    const paramCode = ts.variable.variableCode[0].value;
    const noData = ts.variable.noDataValue ?? NO_DATA_VALUE;
    // first block only: further blocks are alternate methods for the same parameter
    const points = ts.values[0]?.value ?? [];

    for (const point of points) {
      if (range) {
        const t = Date.parse(point.dateTime);
        if (Number.isNaN(t) || t < range.start.getTime() || t > range.end.getTime()) {
          continue;
        }
      }

      readings.push({
        siteNo,
        datetime: point.dateTime,
        date: point.dateTime.split('T')[0],
        paramCode,
        paramName: ts.variable.variableName,
        unit: ts.variable.unit.unitCode ?? '',
        value: parseValue(point.value, noData),
        qualifiers: point.qualifiers.join(','),
      });
    }
  }
  return readings;
}

// ============================================================================
// Client
// ============================================================================

export class NwisClient {
  readonly baseUrl: string;
  readonly sitesPerRequest: number;
  readonly windowDays: number;
  private readonly http: HttpOptions;

  constructor(options: NwisClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.sitesPerRequest = Math.min(
      options.sitesPerRequest ?? MAX_SITES_PER_REQUEST,
      MAX_SITES_PER_REQUEST
    );
    this.windowDays = options.windowDays ?? 30;

    const headers: Record<string, string> = {
      Accept: 'application/json, text/plain',
      'User-Agent': 'gaugeline/0.1 (bulk NWIS ingestion)',
    };
    if (options.apiKey) {
      headers['X-Api-Key'] = options.apiKey;
    }

    this.http = {
      limiter: options.limiter,
      retry: options.retry,
      timeoutMs: options.timeoutMs,
      headers,
      sleep: options.sleep,
      onRetry: options.onRetry,
    };
  }

  siteUrl(state: string): string {
    const params = new URLSearchParams({
      format: 'rdb',
      stateCd: state,
      siteStatus: 'all',
    });
    return `${this.baseUrl}/site/?${params}`;
  }

  readingsUrl(
    siteIds: readonly string[],
    window: DateRange | null,
    parameterCodes: readonly string[]
  ): string {
    const params = new URLSearchParams({
      format: 'json',
      sites: siteIds.join(','),
      parameterCd: parameterCodes.join(','),
      siteStatus: 'all',
    });
    if (window) {
      params.set('startDT', formatDateTime(window.start));
      params.set('endDT', formatDateTime(window.end));
    }
    return `${this.baseUrl}/iv/?${params}`;
  }

  // --------------------------------------------------------------------------
  // Sites
  // --------------------------------------------------------------------------

  /**
   * One page per state. Permanent failures (the service answers 404 for a
   * state without sites) become an error page; transient failures that
   * outlast the retry policy are thrown.
   */
  sitePages(states: readonly string[] = US_STATES): AsyncIterable<SitePage> {
    return paginate<number, SitePage>({
      first: 0,
      fetchPage: async (index) => {
        const state = states[index];
        const url = this.siteUrl(state);
        try {
          const { body } = await fetchText(url, this.http);
          const records = parseRdb(body).map((fields) => ({ state, fields }));
          return { state, records };
        } catch (err) {
          if (err instanceof PermanentError) {
            return { state, records: [], error: err.message };
          }
          throw err;
        }
      },
      next: (_page, index) => (index + 1 < states.length ? index + 1 : null),
    });
  }

  async fetchSites(states: readonly string[] = US_STATES): Promise<SiteFetchResult> {
    const result: SiteFetchResult = { records: [], failedStates: [] };
    if (states.length === 0) return result;

    for await (const page of this.sitePages(states)) {
      if (page.error !== undefined) {
        console.warn(`[WARN] ${page.state}: ${page.error}`);
        result.failedStates.push({ state: page.state, error: page.error });
        continue;
      }
      console.log(`Fetched ${page.state}: ${page.records.length} sites`);
      for (const record of page.records) result.records.push(record);
    }
    return result;
  }

  // --------------------------------------------------------------------------
  // Readings
  // --------------------------------------------------------------------------

  /**
   * Pages of readings for one batch of sites, one date window per page.
   */
  readingPages(siteIds: readonly string[], query: ReadingQuery = {}): AsyncIterable<ReadingPage> {
    if (siteIds.length === 0) {
      throw new RangeError('readingPages requires at least one site id');
    }
    if (siteIds.length > this.sitesPerRequest) {
      throw new RangeError(
        `Batch of ${siteIds.length} sites exceeds the limit of ${this.sitesPerRequest} per request`
      );
    }

    const parameterCodes = query.parameterCodes ?? DEFAULT_PARAMETER_CODES;
    const windows: Array<DateRange | null> = query.dateRange
      ? dateWindows(query.dateRange, this.windowDays)
      : [null];

    return paginate<number, ReadingPage>({
      first: 0,
      fetchPage: async (index) => {
        const window = windows[index];
        const url = this.readingsUrl(siteIds, window, parameterCodes);
        const { body, attempts } = await fetchText(url, this.http);
        return { window, readings: parseIvPayload(body, url, window), attempts };
      },
      next: (_page, index) => (index + 1 < windows.length ? index + 1 : null),
    });
  }

  /**
   * All readings for one batch, pages concatenated in request order.
   */
  async fetchReadingBatch(
    siteIds: readonly string[],
    query: ReadingQuery = {}
  ): Promise<ReadingBatchResult> {
    const result: ReadingBatchResult = { readings: [], requests: 0, attempts: 0 };
    for await (const page of this.readingPages(siteIds, query)) {
      for (const reading of page.readings) result.readings.push(reading);
      result.requests++;
      result.attempts += page.attempts;
    }
    return result;
  }

  /**
   * Readings for any number of sites, batched by the per-request limit.
   * Batches run one after another; callers wanting parallelism batch
   * themselves and call fetchReadingBatch().
   */
  async fetchReadings(siteIds: Iterable<string>, query: ReadingQuery = {}): Promise<Reading[]> {
    const ids = [...new Set(siteIds)];
    if (ids.length === 0) {
      throw new RangeError('fetchReadings requires at least one site id');
    }

    const readings: Reading[] = [];
    for (const batch of chunk(ids, this.sitesPerRequest)) {
      const result = await this.fetchReadingBatch(batch, query);
      for (const reading of result.readings) readings.push(reading);
    }
    return readings;
  }
}
