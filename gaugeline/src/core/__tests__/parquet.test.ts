/**
 * Unit tests for atomic Parquet writes.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { readdir, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { AtomicParquetWriter, readParquet, tempPathFor, writeParquetAtomic } from '../parquet.js';
import { READING_PARQUET_SCHEMA, readingToRow, rowToReading, type StateReading } from '../../schemas/reading.js';

const TEST_DIR = new URL('../../../data/parquet-test', import.meta.url).pathname;
const TARGET = join(TEST_DIR, 'states_iv_MD.parquet');

function reading(datetime: string, value: number | null): StateReading {
  return {
    siteNo: '01646500',
    state: 'MD',
    datetime,
    date: datetime.slice(0, 10),
    paramCode: '00060',
    paramName: 'Streamflow, ft&#179;/s',
    unit: 'ft3/s',
    value,
    qualifiers: 'P',
  };
}

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe('tempPathFor', () => {
  it('places the temporary file beside the target', () => {
    const tmp = tempPathFor('/data/iv/states_iv_MD.parquet');

    expect(tmp.startsWith('/data/iv/.states_iv_MD.parquet.')).toBe(true);
    expect(tmp.endsWith('.tmp')).toBe(true);
  });
});

describe('writeParquetAtomic', () => {
  it('writes rows that read back unchanged', async () => {
    const readings = [
      reading('2024-01-01T00:00:00.000-05:00', 1520),
      reading('2024-01-01T00:15:00.000-05:00', null),
    ];

    const count = await writeParquetAtomic(TARGET, READING_PARQUET_SCHEMA, readings.map(readingToRow));
    const back = await readParquet(TARGET, rowToReading);

    expect(count).toBe(2);
    expect(back).toEqual(readings);
  });

  it('creates the target directory', async () => {
    const nested = join(TEST_DIR, 'a', 'b', 'out.parquet');

    await writeParquetAtomic(nested, READING_PARQUET_SCHEMA, [readingToRow(reading('2024-01-01T00:00:00.000-05:00', 1))]);

    expect(existsSync(nested)).toBe(true);
  });

  it('leaves the previous file intact when a write fails midway', async () => {
    const original = [reading('2024-01-01T00:00:00.000-05:00', 42)];
    await writeParquetAtomic(TARGET, READING_PARQUET_SCHEMA, original.map(readingToRow));

    function* failingRows(): Generator<Record<string, unknown>> {
      yield readingToRow(reading('2024-02-01T00:00:00.000-05:00', 7));
      throw new Error('disk full');
    }

    await expect(writeParquetAtomic(TARGET, READING_PARQUET_SCHEMA, failingRows())).rejects.toThrow('disk full');

    expect(await readParquet(TARGET, rowToReading)).toEqual(original);
    expect(await readdir(TEST_DIR)).toEqual(['states_iv_MD.parquet']);
  });
});

describe('AtomicParquetWriter', () => {
  const at = (minute: number) => `2024-01-01T00:${String(minute).padStart(2, '0')}:00.000-05:00`;

  it('keeps every row when several callers append at once', async () => {
    const writer = await AtomicParquetWriter.open(TARGET, READING_PARQUET_SCHEMA);

    await Promise.all([
      writer.append([readingToRow(reading(at(0), 1)), readingToRow(reading(at(15), 2))]),
      writer.append([readingToRow(reading(at(30), 3))]),
      writer.append([readingToRow(reading(at(45), 4)), readingToRow(reading(at(50), 5))]),
    ]);
    const count = await writer.commit();
    const back = await readParquet(TARGET, rowToReading);

    expect(count).toBe(5);
    expect(back.map((r) => r.value)).toEqual([1, 2, 3, 4, 5]);
  });

  it('writes nothing at the target until commit', async () => {
    const writer = await AtomicParquetWriter.open(TARGET, READING_PARQUET_SCHEMA);
    await writer.append([readingToRow(reading(at(0), 1))]);

    expect(existsSync(TARGET)).toBe(false);
    expect(existsSync(writer.tempPath)).toBe(true);

    await writer.commit();
    expect(existsSync(writer.tempPath)).toBe(false);
  });

  it('discards the temporary file on abort', async () => {
    const original = [reading(at(0), 42)];
    await writeParquetAtomic(TARGET, READING_PARQUET_SCHEMA, original.map(readingToRow));
    const writer = await AtomicParquetWriter.open(TARGET, READING_PARQUET_SCHEMA);
    await writer.append([readingToRow(reading(at(15), 7))]);

    await writer.abort();

    expect(await readParquet(TARGET, rowToReading)).toEqual(original);
    expect(await readdir(TEST_DIR)).toEqual(['states_iv_MD.parquet']);
  });

  it('rejects every append after one fails', async () => {
    const writer = await AtomicParquetWriter.open(TARGET, READING_PARQUET_SCHEMA);
    function* failingRows(): Generator<Record<string, unknown>> {
      throw new Error('disk full');
    }

    await expect(writer.append(failingRows())).rejects.toThrow('disk full');
    await expect(writer.append([readingToRow(reading(at(0), 1))])).rejects.toThrow('disk full');
    await expect(writer.commit()).rejects.toThrow('disk full');
    await writer.abort();
  });
});
