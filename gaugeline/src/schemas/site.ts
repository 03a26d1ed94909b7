import { ParquetSchema } from '@dsnp/parquetjs';
import { z } from 'zod';

export interface Site {
  siteNo: string;          // e.g. "01646500"
  agencyCd: string;        // "USGS"
  stationNm: string;
  siteTpCd: string;        // "ST" stream, "GW" well, ...
  latitude: number;        // decimal degrees
  longitude: number;
  coordDatumCd: string;    // "NAD83"
  altitude: number | null; // feet
  hucCd: string | null;
  stateCd: string;         // partition key, e.g. "MD"
}

export const SITE_PARQUET_SCHEMA = new ParquetSchema({
  agency_cd: { type: 'UTF8', compression: 'SNAPPY' },
  site_no: { type: 'UTF8', compression: 'SNAPPY' },
  station_nm: { type: 'UTF8', compression: 'SNAPPY' },
  site_tp_cd: { type: 'UTF8', compression: 'SNAPPY' },
  dec_lat_va: { type: 'DOUBLE', compression: 'SNAPPY' },
  dec_long_va: { type: 'DOUBLE', compression: 'SNAPPY' },
  dec_coord_datum_cd: { type: 'UTF8', compression: 'SNAPPY' },
  alt_va: { type: 'DOUBLE', optional: true, compression: 'SNAPPY' },
  huc_cd: { type: 'UTF8', optional: true, compression: 'SNAPPY' },
  state_cd: { type: 'UTF8', compression: 'SNAPPY' },
});

export function siteToRow(site: Site): Record<string, unknown> {
  const row: Record<string, unknown> = {
    agency_cd: site.agencyCd,
    site_no: site.siteNo,
    station_nm: site.stationNm,
    site_tp_cd: site.siteTpCd,
    dec_lat_va: site.latitude,
    dec_long_va: site.longitude,
    dec_coord_datum_cd: site.coordDatumCd,
    state_cd: site.stateCd,
  };
  // parquet optional columns are written by omission
  if (site.altitude !== null) row.alt_va = site.altitude;
  if (site.hucCd !== null) row.huc_cd = site.hucCd;
  return row;
}

const siteRowSchema = z.object({
  agency_cd: z.string(),
  site_no: z.string().min(1),
  station_nm: z.string(),
  site_tp_cd: z.string(),
  dec_lat_va: z.number().min(-90).max(90),
  dec_long_va: z.number().min(-180).max(180),
  dec_coord_datum_cd: z.string(),
  alt_va: z.number().nullish(),
  huc_cd: z.string().nullish(),
  state_cd: z.string().min(1),
});

/**
 * Validate a row read back from the catalog file. Throws a ZodError on a
 * malformed row.
 */
export function rowToSite(row: unknown): Site {
  const r = siteRowSchema.parse(row);
  return {
    siteNo: r.site_no,
    agencyCd: r.agency_cd,
    stationNm: r.station_nm,
    siteTpCd: r.site_tp_cd,
    latitude: r.dec_lat_va,
    longitude: r.dec_long_va,
    coordDatumCd: r.dec_coord_datum_cd,
    altitude: r.alt_va ?? null,
    hucCd: r.huc_cd ?? null,
    stateCd: r.state_cd,
  };
}
