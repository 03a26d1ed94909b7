/**
 * Parquet table I/O. Writes land in a temporary file beside the target and
 * are renamed into place only once the file is complete.
 */
import { ParquetReader, ParquetWriter, type ParquetSchema } from '@dsnp/parquetjs';
import { mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { errorMessage } from './errors.js';

export function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * Incremental writer for one Parquet file. Rows are appended in chunks as
 * they arrive; commit() renames the finished file over `path`, abort()
 * discards it. Appends are serialized, so concurrent callers may share one
 * writer.
 */
export class AtomicParquetWriter {
  private queue: Promise<void> = Promise.resolve();
  private failure: { error: unknown } | null = null;
  private closed = false;
  private count = 0;

  private constructor(
    readonly path: string,
    readonly tempPath: string,
    private readonly writer: ParquetWriter
  ) {}

  static async open(path: string, schema: ParquetSchema): Promise<AtomicParquetWriter> {
    await mkdir(dirname(path), { recursive: true });
    const tmp = tempPathFor(path);
    const writer = await ParquetWriter.openFile(schema, tmp);
    return new AtomicParquetWriter(path, tmp, writer);
  }

  /** Rows appended so far. */
  get rowCount(): number {
    return this.count;
  }

  /**
   * Append rows after every earlier append has finished. Once an append
   * fails, every later one rejects with the same error.
   */
  append(rows: Iterable<Record<string, unknown>>): Promise<void> {
    const next = this.queue.then(() => this.write(rows));
    this.queue = next.catch((err: unknown) => {
      this.failure ??= { error: err };
    });
    return next;
  }

  private async write(rows: Iterable<Record<string, unknown>>): Promise<void> {
    if (this.failure) throw this.failure.error;
    if (this.closed) throw new Error(`Parquet writer for ${this.path} is closed`);
    for (const row of rows) {
      await this.writer.appendRow(row);
      this.count++;
    }
  }

  /** Finish the file and move it into place. Returns the row count. */
  async commit(): Promise<number> {
    await this.queue;
    if (this.failure) throw this.failure.error;
    this.closed = true;
    await this.writer.close();
    await rename(this.tempPath, this.path);
    return this.count;
  }

  /** Drop the temporary file; the file at `path` is left as it was. */
  async abort(): Promise<void> {
    await this.queue;
    if (!this.closed) {
      this.closed = true;
      try {
        await this.writer.close();
      } catch (err) {
        console.warn(`Could not close ${this.tempPath}: ${errorMessage(err)}`);
      }
    }
    await rm(this.tempPath, { force: true });
  }
}

/**
 * Write `rows` to `path` atomically and return the number of rows written.
 * On any failure the temporary file is removed and the previous file at
 * `path`, if any, is left untouched.
 */
export async function writeParquetAtomic(
  path: string,
  schema: ParquetSchema,
  rows: Iterable<Record<string, unknown>>
): Promise<number> {
  const out = await AtomicParquetWriter.open(path, schema);
  try {
    await out.append(rows);
    return await out.commit();
  } catch (err) {
    await out.abort();
    throw err;
  }
}

/**
 * Read every row of a Parquet file, mapping each through `parseRow`.
 */
export async function readParquet<T>(
  path: string,
  parseRow: (row: unknown, index: number) => T
): Promise<T[]> {
  const reader = await ParquetReader.openFile(path);
  const rows: T[] = [];
  try {
    const cursor = reader.getCursor();
    let record: unknown = await cursor.next();
    while (record) {
      rows.push(parseRow(record, rows.length));
      record = await cursor.next();
    }
  } finally {
    await reader.close();
  }
  return rows;
}
