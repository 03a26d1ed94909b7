import { describe, it, expect } from 'vitest';
import { parseRdb } from '../rdb.js';

const SITE_RDB = [
  '#',
  '# US Geological Survey',
  '# retrieved: 2024-01-01',
  '#',
  'agency_cd\tsite_no\tstation_nm\tsite_tp_cd\tdec_lat_va\tdec_long_va',
  '5s\t15s\t50s\t7s\t16s\t16s',
  'USGS\t01646500\tPOTOMAC RIVER NEAR WASH, DC LITTLE FALLS PUMP STA\tST\t38.94977778\t-77.12763889',
  'USGS\t01647000\tLITTLE FALLS BRANCH NEAR BETHESDA, MD\tST\t38.96\t-77.105',
  '',
].join('\n');

describe('parseRdb', () => {
  it('maps data lines onto the header, skipping comments and the format line', () => {
    const records = parseRdb(SITE_RDB);

    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      agency_cd: 'USGS',
      site_no: '01646500',
      station_nm: 'POTOMAC RIVER NEAR WASH, DC LITTLE FALLS PUMP STA',
      site_tp_cd: 'ST',
      dec_lat_va: '38.94977778',
      dec_long_va: '-77.12763889',
    });
    expect(records[1].site_no).toBe('01647000');
  });

  it('keeps leading zeros in site numbers', () => {
    expect(parseRdb(SITE_RDB).map((r) => r.site_no)).toEqual(['01646500', '01647000']);
  });

  it('fills missing trailing cells with empty strings', () => {
    const records = parseRdb('site_no\talt_va\thuc_cd\n15s\t8s\t16s\n01646500\t37.2\n');

    expect(records).toEqual([{ site_no: '01646500', alt_va: '37.2', huc_cd: '' }]);
  });

  it('handles CRLF line endings', () => {
    const records = parseRdb('site_no\tstation_nm\r\n15s\t50s\r\n01646500\tPOTOMAC\r\n');

    expect(records).toEqual([{ site_no: '01646500', station_nm: 'POTOMAC' }]);
  });

  it('parses a table without a format line', () => {
    const records = parseRdb('site_no\tsite_tp_cd\n01646500\tST\n');

    expect(records).toEqual([{ site_no: '01646500', site_tp_cd: 'ST' }]);
  });

  it('returns nothing for comment-only input', () => {
    expect(parseRdb('# No sites found matching all criteria\n')).toEqual([]);
    expect(parseRdb('')).toEqual([]);
  });
});
