/**
 * Throttled HTTP fetcher with retry and lazy pagination.
 * Every request passes the shared rate limiter before it goes out.
 */
import { PermanentError, TransientError, isTransientStatus } from './errors.js';
import { type RateLimiter, unlimitedRateLimiter } from './rate-limiter.js';
import { DEFAULT_RETRY, withRetry, type RetryHooks, type RetryPolicy } from './retry.js';

// ============================================================================
// Types
// ============================================================================

export interface FetchProgress {
  fetched: number;
  total: number | null;
  batchNum: number;
  message: string;
}

export interface HttpOptions {
  limiter?: RateLimiter;
  retry?: RetryPolicy;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Injected for tests; defaults to real timers. */
  sleep?: RetryHooks['sleep'];
  onRetry?: RetryHooks['onRetry'];
}

export interface TextResponse {
  body: string;
  status: number;
  attempts: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

// ============================================================================
// Single Attempt
// ============================================================================

/**
 * One throttled GET. Failures are thrown as TransientError or PermanentError.
 */
export async function fetchOnce(
  url: string,
  options: HttpOptions = {}
): Promise<{ body: string; status: number }> {
  const limiter = options.limiter ?? unlimitedRateLimiter;
  await limiter.acquire();

  let res: Response;
  try {
    res = await fetch(url, {
      headers: options.headers,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (err) {
    const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    throw new TransientError(`Request failed: ${reason}`, url, null, { cause: err });
  }

  const body = await res.text();

  if (!res.ok) {
    const message = `HTTP ${res.status}: ${body.slice(0, 200).trim()}`;
    if (isTransientStatus(res.status)) {
      throw new TransientError(message, url, res.status);
    }
    throw new PermanentError(message, url, res.status);
  }

  return { body, status: res.status };
}

/**
 * GET with the retry policy applied. The last error is rethrown once the
 * policy gives up.
 */
export async function fetchText(
  url: string,
  options: HttpOptions = {}
): Promise<TextResponse> {
  const { value, attempts } = await withRetry(
    () => fetchOnce(url, options),
    options.retry ?? DEFAULT_RETRY,
    { sleep: options.sleep, onRetry: options.onRetry }
  );
  return { ...value, attempts };
}

// ============================================================================
// Pagination
// ============================================================================

export interface PaginateConfig<TCursor, TPage> {
  /** Cursor of the first page; every new iteration starts here. */
  first: TCursor;
  fetchPage: (cursor: TCursor, pageNum: number) => Promise<TPage>;
  /** Cursor of the page after `page`, or null when the sequence is done. */
  next: (page: TPage, cursor: TCursor) => TCursor | null;
}

/**
 * Lazy, restartable sequence of pages. A page is only requested when the
 * consumer pulls it, and each `for await` starts again from `first`.
 */
export function paginate<TCursor, TPage>(
  config: PaginateConfig<TCursor, TPage>
): AsyncIterable<TPage> {
  return {
    async *[Symbol.asyncIterator]() {
      let cursor: TCursor | null = config.first;
      let pageNum = 0;

      while (cursor !== null) {
        const page = await config.fetchPage(cursor, pageNum);
        yield page;
        cursor = config.next(page, cursor);
        pageNum++;
      }
    },
  };
}
