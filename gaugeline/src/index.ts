export { loadConfig } from './config.js';
export type { Config } from './config.js';
export {
  FatalError,
  PermanentError,
  RequestError,
  TransientError,
  classifyError,
} from './core/errors.js';
export type { ErrorKind } from './core/errors.js';
export { fetchText, paginate } from './core/fetcher.js';
export type { FetchProgress, HttpOptions, PaginateConfig } from './core/fetcher.js';
export { RunLedger, openLedger } from './core/ledger.js';
export { AtomicParquetWriter, readParquet, writeParquetAtomic } from './core/parquet.js';
export { IntervalRateLimiter, unlimitedRateLimiter } from './core/rate-limiter.js';
export type { RateLimiter } from './core/rate-limiter.js';
export { DEFAULT_RETRY, decideRetry, withRetry } from './core/retry.js';
export type { RetryDecision, RetryPolicy } from './core/retry.js';
export { parseRdb } from './core/rdb.js';
export { US_STATES, resolveStates } from './registry/states.js';
export { rowToReading } from './schemas/reading.js';
export type { Reading, StateReading } from './schemas/reading.js';
export type { Site } from './schemas/site.js';
export { NwisClient, dateWindows, parseIvPayload } from './sources/nwis.js';
export type { DateRange, ReadingQuery } from './sources/nwis.js';
export { buildCatalog, loadCatalog, normalizeSites } from './ingestion/catalog.js';
export {
  collectAll,
  collectPartition,
  dedupeReadings,
  dedupeWindowPages,
  exitCodeFor,
  formatSummary,
  partitionFileName,
} from './ingestion/collector.js';
export type { PartitionOutcome, ReadingSource, RunSummary } from './ingestion/collector.js';
export { createClient, runCatalogBuild, runCollection } from './ingestion/run.js';
