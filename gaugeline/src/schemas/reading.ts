import { ParquetSchema } from '@dsnp/parquetjs';
import { z } from 'zod';

export interface Reading {
  siteNo: string;
  datetime: string;      // ISO 8601 with the service's UTC offset
  date: string;          // YYYY-MM-DD part of datetime
  paramCode: string;     // "00060"
  paramName: string;
  unit: string;          // "ft3/s"
  value: number | null;  // null for the no-data sentinel
  qualifiers: string;    // "P", "A,e"
}

/** Reading as stored in a partition file. */
export interface StateReading extends Reading {
  state: string;
}

export const DEFAULT_PARAMETER_CODES = ['00060', '00065'] as const; // discharge, gage height

export const READING_PARQUET_SCHEMA = new ParquetSchema({
  site_no: { type: 'UTF8', compression: 'SNAPPY' },
  state: { type: 'UTF8', compression: 'SNAPPY' },
  datetime: { type: 'UTF8', compression: 'SNAPPY' },
  date: { type: 'UTF8', compression: 'SNAPPY' },
  param_code: { type: 'UTF8', compression: 'SNAPPY' },
  param_name: { type: 'UTF8', compression: 'SNAPPY' },
  unit: { type: 'UTF8', compression: 'SNAPPY' },
  value: { type: 'DOUBLE', optional: true, compression: 'SNAPPY' },
  qualifiers: { type: 'UTF8', compression: 'SNAPPY' },
});

export function readingKey(reading: Reading): string {
  return `${reading.siteNo}|${reading.datetime}|${reading.paramCode}`;
}

export function readingToRow(reading: StateReading): Record<string, unknown> {
  const row: Record<string, unknown> = {
    site_no: reading.siteNo,
    state: reading.state,
    datetime: reading.datetime,
    date: reading.date,
    param_code: reading.paramCode,
    param_name: reading.paramName,
    unit: reading.unit,
    qualifiers: reading.qualifiers,
  };
  if (reading.value !== null) row.value = reading.value;
  return row;
}

const readingRowSchema = z.object({
  site_no: z.string(),
  state: z.string(),
  datetime: z.string(),
  date: z.string(),
  param_code: z.string(),
  param_name: z.string(),
  unit: z.string(),
  value: z.number().nullish(),
  qualifiers: z.string(),
});

export function rowToReading(row: unknown): StateReading {
  const r = readingRowSchema.parse(row);
  return {
    siteNo: r.site_no,
    state: r.state,
    datetime: r.datetime,
    date: r.date,
    paramCode: r.param_code,
    paramName: r.param_name,
    unit: r.unit,
    value: r.value ?? null,
    qualifiers: r.qualifiers,
  };
}
