/**
 * Partitioned collector: readings for every site of a state, fetched in
 * batches under a bounded worker pool and written to one Parquet file per
 * state.
 */
import pLimit from 'p-limit';
import { access, constants, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { FatalError, classifyError, errorMessage, type ErrorKind } from '../core/errors.js';
import type { FetchProgress } from '../core/fetcher.js';
import type { PartitionEntry, RunLedger } from '../core/ledger.js';
import { AtomicParquetWriter } from '../core/parquet.js';
import { READING_PARQUET_SCHEMA, readingKey, readingToRow, type Reading } from '../schemas/reading.js';
import type { Site } from '../schemas/site.js';
import { chunk, type ReadingPage, type ReadingQuery } from '../sources/nwis.js';
import { sitesForPartition } from './catalog.js';

// ============================================================================
// Types
// ============================================================================

/** The part of NwisClient the collector drives. */
export interface ReadingSource {
  readonly sitesPerRequest: number;
  readingPages(siteIds: readonly string[], query?: ReadingQuery): AsyncIterable<ReadingPage>;
}

export interface CollectorOptions {
  source: ReadingSource;
  outputDir: string;
  query?: ReadingQuery;
  /** Batches in flight per partition. */
  concurrency?: number;
  /** Site types to keep; empty keeps all. */
  siteTypes?: readonly string[];
  onProgress?: (partitionKey: string, progress: FetchProgress) => void;
}

export type PartitionStatus = 'written' | 'empty' | 'skipped' | 'failed';

export interface FailedBatch {
  siteIds: string[];
  kind: ErrorKind;
  error: string;
}

export interface PartitionOutcome {
  partitionKey: string;
  status: PartitionStatus;
  /** Rows in the output file. */
  written: number;
  outputPath: string | null;
  sites: number;
  batches: number;
  skippedSites: string[];
  failedBatches: FailedBatch[];
  duplicates: number;
  foreignReadings: number;
  error?: string;
}

export interface RunSummary {
  partitions: number;
  written: number;
  empty: number;
  skipped: number;
  failed: number;
  readingsWritten: number;
  failedPartitions: Array<{ partitionKey: string; error: string }>;
  skippedBatches: Array<{ partitionKey: string } & FailedBatch>;
  outcomes: PartitionOutcome[];
}

export interface CollectAllOptions extends CollectorOptions {
  partitionConcurrency?: number;
  ledger?: RunLedger;
  /** Skip partitions the ledger saw complete within resumeMaxAgeHours. */
  resume?: boolean;
  resumeMaxAgeHours?: number;
}

interface PartitionSink {
  writer: Promise<AtomicParquetWriter> | null;
  /** First append failure; stops every batch of the partition. */
  failure: { error: unknown } | null;
}

type BatchResult =
  | { ok: true; siteIds: string[]; written: number; duplicates: number; foreignReadings: number }
  | ({ ok: false; duplicates: number; foreignReadings: number } & FailedBatch);

// ============================================================================
// Helpers
// ============================================================================

export function partitionFileName(partitionKey: string): string {
  return `states_iv_${partitionKey}.parquet`;
}

/**
 * Drop repeated (site, timestamp, parameter) readings. The last value seen
 * wins and keeps the position of the first occurrence.
 */
export function dedupeReadings<T extends Reading>(
  readings: Iterable<T>
): { readings: T[]; duplicates: number } {
  const byKey = new Map<string, T>();
  let total = 0;
  for (const reading of readings) {
    byKey.set(readingKey(reading), reading);
    total++;
  }
  return { readings: [...byKey.values()], duplicates: total - byKey.size };
}

/**
 * Deduplicate a batch's window pages as they stream in. Neighbouring windows
 * share only their boundary instant, so readings at or after a window's end
 * are held back and merged into the next page; everything else is final.
 */
export async function* dedupeWindowPages(
  pages: AsyncIterable<ReadingPage>
): AsyncGenerator<{ readings: Reading[]; duplicates: number }> {
  let carried: Reading[] = [];

  for await (const page of pages) {
    const deduped = dedupeReadings(carried.length > 0 ? carried.concat(page.readings) : page.readings);
    carried = [];

    if (!page.window) {
      yield deduped;
      continue;
    }

    const boundary = page.window.end.getTime();
    const settled: Reading[] = [];
    for (const reading of deduped.readings) {
      (Date.parse(reading.datetime) >= boundary ? carried : settled).push(reading);
    }
    yield { readings: settled, duplicates: deduped.duplicates };
  }

  if (carried.length > 0) {
    yield { readings: carried, duplicates: 0 };
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function ensureWritableDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
  } catch (err) {
    throw new FatalError(`Output directory ${dir} is not writable: ${errorMessage(err)}`, { cause: err });
  }
}

function baseOutcome(partitionKey: string): PartitionOutcome {
  return {
    partitionKey,
    status: 'empty',
    written: 0,
    outputPath: null,
    sites: 0,
    batches: 0,
    skippedSites: [],
    failedBatches: [],
    duplicates: 0,
    foreignReadings: 0,
  };
}

// ============================================================================
// Single Partition
// ============================================================================

/**
 * Collect one partition. Never throws: batch failures land in skippedSites,
 * anything else marks the outcome failed.
 *
 * Each batch streams its window pages straight into the partition's
 * temporary file, so only the pages in flight are held in memory. A batch
 * that fails after some of its pages were written keeps those rows and
 * still lists its sites as skipped.
 */
export async function collectPartition(
  partitionKey: string,
  catalog: readonly Site[],
  options: CollectorOptions
): Promise<PartitionOutcome> {
  const outcome = baseOutcome(partitionKey);
  const path = join(options.outputDir, partitionFileName(partitionKey));
  const sink: PartitionSink = { writer: null, failure: null };

  // opened on the first rows, so a partition without readings leaves no temp file
  const output = (): Promise<AtomicParquetWriter> =>
    (sink.writer ??= AtomicParquetWriter.open(path, READING_PARQUET_SCHEMA));

  try {
    const sites = sitesForPartition(catalog, partitionKey, options.siteTypes);
    outcome.sites = sites.length;

    if (sites.length === 0) {
      await rm(path, { force: true });
      console.log(`${partitionKey}: no matching sites, nothing to write`);
      return outcome;
    }

    const siteIds = sites.map((s) => s.siteNo);
    const batches = chunk(siteIds, options.source.sitesPerRequest);
    outcome.batches = batches.length;
    console.log(`${partitionKey}: ${sites.length} sites in ${batches.length} batches`);

    const limit = pLimit(options.concurrency ?? 4);
    let fetched = 0;

    const collectBatch = async (batch: string[], batchNum: number): Promise<BatchResult> => {
      const requested = new Set(batch);
      const counts = { written: 0, duplicates: 0, foreignReadings: 0 };
      const pages = dedupeWindowPages(options.source.readingPages(batch, options.query))[Symbol.asyncIterator]();

      for (;;) {
        if (sink.failure) return { ok: true, siteIds: batch, ...counts };

        let next: IteratorResult<{ readings: Reading[]; duplicates: number }>;
        try {
          next = await pages.next();
        } catch (err) {
          const error = errorMessage(err);
          console.warn(`  ${partitionKey} batch ${batchNum}: SKIPPED ${batch.length} sites (${error})`);
          return { ok: false, siteIds: batch, kind: classifyError(err), error, ...counts };
        }
        if (next.done) break;

        counts.duplicates += next.value.duplicates;
        const rows: Record<string, unknown>[] = [];
        for (const reading of next.value.readings) {
          if (requested.has(reading.siteNo)) {
            rows.push(readingToRow({ ...reading, state: partitionKey }));
          } else {
            counts.foreignReadings++;
          }
        }
        if (rows.length === 0) continue;

        try {
          await (await output()).append(rows);
        } catch (err) {
          sink.failure ??= { error: err };
          return { ok: true, siteIds: batch, ...counts };
        }
        counts.written += rows.length;
      }

      fetched += counts.written;
      options.onProgress?.(partitionKey, {
        fetched,
        total: null,
        batchNum,
        message: `Batch ${batchNum + 1}/${batches.length}: ${counts.written} readings (${batch.length} sites)`,
      });
      return { ok: true, siteIds: batch, ...counts };
    };

    const results = await Promise.all(
      batches.map((batch, batchNum) => limit(() => collectBatch(batch, batchNum)))
    );
    if (sink.failure) throw sink.failure.error;

    for (const result of results) {
      outcome.duplicates += result.duplicates;
      outcome.foreignReadings += result.foreignReadings;
      if (!result.ok) {
        outcome.failedBatches.push({ siteIds: result.siteIds, kind: result.kind, error: result.error });
        for (const siteId of result.siteIds) outcome.skippedSites.push(siteId);
      }
    }

    if (outcome.failedBatches.length === batches.length) {
      outcome.status = 'failed';
      outcome.error = `all ${batches.length} batches failed`;
      console.warn(`${partitionKey}: FAILED (${outcome.error})`);
      if (sink.writer) await discard(sink.writer);
      return outcome;
    }

    if (outcome.foreignReadings > 0) {
      console.warn(`  ${partitionKey}: dropped ${outcome.foreignReadings} readings for sites outside the batch`);
    }

    if (!sink.writer) {
      await rm(path, { force: true });
      console.log(`${partitionKey}: no readings, nothing to write`);
      return outcome;
    }

    outcome.written = await (await sink.writer).commit();
    outcome.outputPath = path;
    outcome.status = 'written';
    console.log(
      `${partitionKey}: wrote ${outcome.written} rows → ${path}` +
        (outcome.duplicates > 0 ? ` (${outcome.duplicates} duplicates dropped)` : '')
    );
    return outcome;
  } catch (err) {
    outcome.status = 'failed';
    outcome.error = errorMessage(err);
    console.warn(`${partitionKey}: FAILED (${outcome.error})`);
    if (sink.writer) await discard(sink.writer);
    return outcome;
  }
}

async function discard(opening: Promise<AtomicParquetWriter>): Promise<void> {
  try {
    await (await opening).abort();
  } catch (err) {
    console.warn(`  could not remove temporary output: ${errorMessage(err)}`);
  }
}

// ============================================================================
// All Partitions
// ============================================================================

async function isResumable(
  partitionKey: string,
  outputDir: string,
  ledger: RunLedger,
  maxAgeHours: number
): Promise<boolean> {
  let entry: PartitionEntry | null;
  try {
    entry = ledger.isFresh(partitionKey, maxAgeHours) ? ledger.getPartition(partitionKey) : null;
  } catch (err) {
    console.warn(`[WARN] ${partitionKey}: run ledger unreadable, collecting again (${errorMessage(err)})`);
    return false;
  }
  if (!entry) return false;
  if (entry.status === 'empty') return true;
  return fileExists(join(outputDir, partitionFileName(partitionKey)));
}

/**
 * Record a completed partition, or forget one that did not complete. A
 * ledger failure only costs the resume shortcut, so it is logged.
 */
function updateLedger(ledger: RunLedger, outcome: PartitionOutcome): void {
  try {
    if (outcome.status === 'written' || outcome.status === 'empty') {
      ledger.recordPartition({
        partitionKey: outcome.partitionKey,
        status: outcome.status,
        outputPath: outcome.outputPath,
        rowCount: outcome.written,
        skippedSites: outcome.skippedSites,
      });
    } else {
      ledger.forgetPartition(outcome.partitionKey);
    }
  } catch (err) {
    console.warn(`[WARN] ${outcome.partitionKey}: run ledger not updated (${errorMessage(err)})`);
  }
}

export function summarize(outcomes: readonly PartitionOutcome[]): RunSummary {
  const summary: RunSummary = {
    partitions: outcomes.length,
    written: 0,
    empty: 0,
    skipped: 0,
    failed: 0,
    readingsWritten: 0,
    failedPartitions: [],
    skippedBatches: [],
    outcomes: [...outcomes],
  };

  for (const outcome of outcomes) {
    summary[outcome.status]++;
    summary.readingsWritten += outcome.written;
    if (outcome.status === 'failed') {
      summary.failedPartitions.push({
        partitionKey: outcome.partitionKey,
        error: outcome.error ?? 'unknown error',
      });
    }
    for (const batch of outcome.failedBatches) {
      summary.skippedBatches.push({ partitionKey: outcome.partitionKey, ...batch });
    }
  }
  return summary;
}

/**
 * Collect every partition. One partition failing never stops the others;
 * only an unusable output directory is fatal.
 */
export async function collectAll(
  partitionKeys: readonly string[],
  catalog: readonly Site[],
  options: CollectAllOptions
): Promise<RunSummary> {
  await ensureWritableDir(options.outputDir);

  const limit = pLimit(options.partitionConcurrency ?? 1);
  const maxAgeHours = options.resumeMaxAgeHours ?? 24;
  const { ledger } = options;

  const outcomes = await Promise.all(
    partitionKeys.map((partitionKey) =>
      limit(async () => {
        if (options.resume && ledger && (await isResumable(partitionKey, options.outputDir, ledger, maxAgeHours))) {
          console.log(`${partitionKey}: already completed → skipping`);
          const skipped: PartitionOutcome = { ...baseOutcome(partitionKey), status: 'skipped' };
          return skipped;
        }

        const outcome = await collectPartition(partitionKey, catalog, options);

        if (ledger) updateLedger(ledger, outcome);
        return outcome;
      })
    )
  );

  return summarize(outcomes);
}

/**
 * Non-zero only when there was work and every partition of it failed.
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.partitions > 0 && summary.failed === summary.partitions ? 1 : 0;
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    `Partitions processed: ${summary.partitions} ` +
      `(written ${summary.written}, empty ${summary.empty}, skipped ${summary.skipped}, failed ${summary.failed})`,
    `Readings written: ${summary.readingsWritten.toLocaleString('en-US')}`,
  ];

  if (summary.failedPartitions.length > 0) {
    lines.push('Failed partitions:');
    for (const { partitionKey, error } of summary.failedPartitions) {
      lines.push(`  ${partitionKey}: ${error}`);
    }
  }

  if (summary.skippedBatches.length > 0) {
    lines.push('Skipped batches:');
    for (const batch of summary.skippedBatches) {
      lines.push(`  ${batch.partitionKey} [${batch.siteIds.join(',')}]: ${batch.error}`);
    }
  }

  return lines;
}
