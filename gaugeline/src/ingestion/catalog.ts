/**
 * Site catalog: every NWIS monitoring site nationwide, normalized into one
 * Parquet table that the collector partitions by state.
 */
import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { FatalError, errorMessage } from '../core/errors.js';
import { readParquet, writeParquetAtomic } from '../core/parquet.js';
import { US_STATES } from '../registry/states.js';
import { SITE_PARQUET_SCHEMA, rowToSite, siteToRow, type Site } from '../schemas/site.js';
import type { NwisClient, SiteFetchResult, SiteRecord } from '../sources/nwis.js';

export const CATALOG_FILE = 'usgs_all_sites.parquet';

const SITE_NO = /^\d{8,15}$/;

export interface NormalizeResult {
  sites: Site[];
  dropped: number;
  duplicates: number;
}

export interface CatalogBuildResult extends NormalizeResult {
  path: string;
  fetched: number;
  failedStates: Array<{ state: string; error: string }>;
}

export function catalogPath(dataDir: string): string {
  return join(dataDir, CATALOG_FILE);
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Normalize one RDB row, or return null when it lacks a usable site number
 * or coordinates.
 */
export function normalizeSiteRecord(record: SiteRecord): Site | null {
  const f = record.fields;
  const siteNo = f.site_no?.trim() ?? '';
  if (!SITE_NO.test(siteNo)) return null;

  const latitude = parseNumber(f.dec_lat_va);
  const longitude = parseNumber(f.dec_long_va);
  if (latitude === null || longitude === null) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;

  return {
    siteNo,
    agencyCd: f.agency_cd?.trim() ?? '',
    stationNm: f.station_nm?.trim() ?? '',
    siteTpCd: f.site_tp_cd?.trim() ?? '',
    latitude,
    longitude,
    coordDatumCd: f.dec_coord_datum_cd?.trim() ?? '',
    altitude: parseNumber(f.alt_va),
    hucCd: optionalText(f.huc_cd),
    stateCd: record.state,
  };
}

/**
 * Normalize, drop malformed rows, and drop repeated site numbers (a site
 * listed under several agencies) keeping the first.
 */
export function normalizeSites(records: readonly SiteRecord[]): NormalizeResult {
  const seen = new Set<string>();
  const sites: Site[] = [];
  let dropped = 0;
  let duplicates = 0;

  for (const record of records) {
    const site = normalizeSiteRecord(record);
    if (!site) {
      dropped++;
      continue;
    }
    if (seen.has(site.siteNo)) {
      duplicates++;
      continue;
    }
    seen.add(site.siteNo);
    sites.push(site);
  }

  return { sites, dropped, duplicates };
}

/**
 * Fetch, normalize and persist the nationwide catalog. Any failure that
 * leaves the catalog incomplete is fatal.
 */
export async function buildCatalog(
  client: NwisClient,
  options: { dataDir: string; states?: readonly string[] }
): Promise<CatalogBuildResult> {
  const states = options.states ?? US_STATES;
  const path = catalogPath(options.dataDir);

  let fetched: SiteFetchResult;
  try {
    fetched = await client.fetchSites(states);
  } catch (err) {
    throw new FatalError(`Site catalog fetch failed: ${errorMessage(err)}`, { cause: err });
  }

  const normalized = normalizeSites(fetched.records);
  console.log(
    `Normalized ${fetched.records.length} rows: ${normalized.sites.length} sites, ` +
      `${normalized.dropped} malformed dropped, ${normalized.duplicates} duplicates dropped`
  );
  if (normalized.dropped > 0) {
    console.warn(`[WARN] Dropped ${normalized.dropped} rows missing a site number or coordinates`);
  }

  if (normalized.sites.length === 0) {
    throw new FatalError(
      `Site catalog is empty: ${fetched.failedStates.length}/${states.length} states failed`
    );
  }

  try {
    await writeParquetAtomic(path, SITE_PARQUET_SCHEMA, normalized.sites.map(siteToRow));
  } catch (err) {
    throw new FatalError(`Cannot write site catalog to ${path}: ${errorMessage(err)}`, { cause: err });
  }
  console.log(`Wrote ${path} (${normalized.sites.length} sites)`);

  return {
    ...normalized,
    path,
    fetched: fetched.records.length,
    failedStates: fetched.failedStates,
  };
}

export async function loadCatalog(path: string): Promise<Site[]> {
  try {
    await access(path);
  } catch (err) {
    throw new FatalError(`Site catalog not found at ${path}; build it first`, { cause: err });
  }

  try {
    return await readParquet(path, (row, index) => {
      try {
        return rowToSite(row);
      } catch (err) {
        throw new Error(`row ${index}: ${errorMessage(err)}`, { cause: err });
      }
    });
  } catch (err) {
    throw new FatalError(`Malformed site catalog ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

export function sitesForPartition(
  catalog: readonly Site[],
  partitionKey: string,
  siteTypes: readonly string[] = []
): Site[] {
  return catalog.filter(
    (site) =>
      site.stateCd === partitionKey &&
      (siteTypes.length === 0 || siteTypes.includes(site.siteTpCd))
  );
}
