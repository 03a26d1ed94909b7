/**
 * Run entry points shared by the CLI scripts: wire config into the client,
 * run a step, report, and turn the result into an exit code.
 */
import { join } from 'node:path';
import type { Config } from '../config.js';
import { FatalError } from '../core/errors.js';
import type { FetchProgress } from '../core/fetcher.js';
import { openLedger } from '../core/ledger.js';
import { IntervalRateLimiter, type RateLimiter } from '../core/rate-limiter.js';
import { resolveStates } from '../registry/states.js';
import { NwisClient } from '../sources/nwis.js';
import { buildCatalog, catalogPath, loadCatalog } from './catalog.js';
import { collectAll, exitCodeFor, formatSummary, type RunSummary } from './collector.js';

export function readingsDir(dataDir: string): string {
  return join(dataDir, 'iv');
}

export function ledgerPath(dataDir: string): string {
  return join(dataDir, 'cache', 'ledger.db');
}

/**
 * One client per run; its limiter is the throttle every worker shares.
 */
export function createClient(config: Config, limiter?: RateLimiter): NwisClient {
  return new NwisClient({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
    limiter: limiter ?? new IntervalRateLimiter(config.requestIntervalMs),
    sitesPerRequest: config.sitesPerRequest,
    windowDays: config.windowDays,
  });
}

/** One line per finished batch, so long partitions show they are moving. */
export function logProgress(partitionKey: string, progress: FetchProgress): void {
  console.log(`  ${partitionKey} ${progress.message}, ${progress.fetched.toLocaleString('en-US')} readings so far`);
}

function reportFatal(err: unknown): number {
  if (err instanceof FatalError) {
    console.error(`[FATAL] ${err.message}`);
    return 1;
  }
  throw err;
}

export async function runCatalogBuild(
  config: Config,
  options: { states?: readonly string[]; client?: NwisClient } = {}
): Promise<number> {
  const t0 = Date.now();
  try {
    const states = resolveStates(options.states ?? []);
    const client = options.client ?? createClient(config);
    console.log(`Building site catalog for ${states.length} states from ${client.baseUrl}`);

    const result = await buildCatalog(client, { dataDir: config.dataDir, states });
    if (result.failedStates.length > 0) {
      console.warn(
        `[WARN] ${result.failedStates.length} states returned no sites: ` +
          result.failedStates.map((f) => f.state).join(', ')
      );
    }
    console.log(`\nTotal time: ${((Date.now() - t0) / 1000).toFixed(2)} seconds`);
    return 0;
  } catch (err) {
    return reportFatal(err);
  }
}

export interface CollectionRunOptions {
  states?: readonly string[];
  resume?: boolean;
  client?: NwisClient;
}

export async function runCollection(
  config: Config,
  options: CollectionRunOptions = {}
): Promise<{ exitCode: number; summary: RunSummary | null }> {
  const t0 = Date.now();
  try {
    const states = resolveStates(options.states ?? []);
    const catalog = await loadCatalog(catalogPath(config.dataDir));
    console.log(`Loaded site list with ${catalog.length} sites`);

    const client = options.client ?? createClient(config);
    const ledger = await openLedger(ledgerPath(config.dataDir));

    let summary: RunSummary;
    try {
      summary = await collectAll(states, catalog, {
        source: client,
        outputDir: readingsDir(config.dataDir),
        query: { dateRange: config.dateRange, parameterCodes: config.parameterCodes },
        concurrency: config.concurrency,
        partitionConcurrency: config.partitionConcurrency,
        siteTypes: config.siteTypes,
        ledger,
        resume: options.resume ?? false,
        resumeMaxAgeHours: config.resumeMaxAgeHours,
        onProgress: logProgress,
      });
    } finally {
      ledger.close();
    }

    console.log('\n=== Summary ===');
    for (const line of formatSummary(summary)) {
      if (summary.failed > 0 || summary.skippedBatches.length > 0) {
        console.warn(line);
      } else {
        console.log(line);
      }
    }
    console.log(`Total time: ${((Date.now() - t0) / 1000).toFixed(2)} seconds`);

    return { exitCode: exitCodeFor(summary), summary };
  } catch (err) {
    return { exitCode: reportFatal(err), summary: null };
  }
}
