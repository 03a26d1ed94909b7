/**
 * SQLite run ledger: the last completed collection of each partition.
 * Backs the opt-in resume mode of the collector.
 */
import Database from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

// ============================================================================
// Types
// ============================================================================

export type LedgerStatus = 'written' | 'empty';

export interface PartitionEntry {
  partitionKey: string;
  status: LedgerStatus;
  outputPath: string | null;
  rowCount: number;
  skippedSites: string[];
  finishedAt: string;
}

interface PartitionRow {
  partition_key: string;
  status: LedgerStatus;
  output_path: string | null;
  row_count: number;
  skipped_sites: string;
  finished_at: string;
}

// ============================================================================
// Ledger
// ============================================================================

export class RunLedger {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS partitions (
        partition_key TEXT PRIMARY KEY,
        status TEXT NOT NULL CHECK (status IN ('written', 'empty')),
        output_path TEXT,
        row_count INTEGER NOT NULL DEFAULT 0,
        skipped_sites TEXT NOT NULL DEFAULT '[]',
        finished_at TEXT NOT NULL
      );
    `);
  }

  recordPartition(entry: {
    partitionKey: string;
    status: LedgerStatus;
    outputPath: string | null;
    rowCount: number;
    skippedSites: readonly string[];
    finishedAt?: Date;
  }): void {
    this.db
      .prepare(
        `INSERT INTO partitions (partition_key, status, output_path, row_count, skipped_sites, finished_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(partition_key) DO UPDATE SET
           status = excluded.status,
           output_path = excluded.output_path,
           row_count = excluded.row_count,
           skipped_sites = excluded.skipped_sites,
           finished_at = excluded.finished_at`
      )
      .run(
        entry.partitionKey,
        entry.status,
        entry.outputPath,
        entry.rowCount,
        JSON.stringify(entry.skippedSites),
        (entry.finishedAt ?? new Date()).toISOString()
      );
  }

  getPartition(partitionKey: string): PartitionEntry | null {
    const row = this.db
      .prepare(
        `SELECT partition_key, status, output_path, row_count, skipped_sites, finished_at
         FROM partitions WHERE partition_key = ?`
      )
      .get(partitionKey) as PartitionRow | undefined;

    if (!row) return null;

    return {
      partitionKey: row.partition_key,
      status: row.status,
      outputPath: row.output_path,
      rowCount: row.row_count,
      skippedSites: JSON.parse(row.skipped_sites) as string[],
      finishedAt: row.finished_at,
    };
  }

  /**
   * True when the partition completed less than `maxAgeHours` ago.
   */
  isFresh(partitionKey: string, maxAgeHours = 24, now: Date = new Date()): boolean {
    const entry = this.getPartition(partitionKey);
    if (!entry) return false;

    const ageMs = now.getTime() - new Date(entry.finishedAt).getTime();
    return ageMs / (1000 * 60 * 60) < maxAgeHours;
  }

  forgetPartition(partitionKey: string): void {
    this.db.prepare(`DELETE FROM partitions WHERE partition_key = ?`).run(partitionKey);
  }

  clear(): void {
    this.db.prepare(`DELETE FROM partitions`).run();
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function openLedger(dbPath: string): Promise<RunLedger> {
  await mkdir(dirname(dbPath), { recursive: true });
  return new RunLedger(dbPath);
}
