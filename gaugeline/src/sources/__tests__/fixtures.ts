/**
 * Builders for NWIS responses shared by the client, catalog and pipeline tests.
 */

export interface IvPoint {
  dateTime: string;
  value: string | null;
  qualifiers?: string[];
}

export interface IvSeries {
  siteNo: string;
  paramCode?: string;
  paramName?: string;
  unit?: string;
  noDataValue?: number;
  points: IvPoint[];
}

export function ivPayload(series: IvSeries[]): string {
  return JSON.stringify({
    name: 'ns1:timeSeriesResponseType',
    value: {
      queryInfo: { queryURL: 'https://nwis.test/nwis/iv/' },
      timeSeries: series.map((s) => ({
        sourceInfo: { siteName: `SITE ${s.siteNo}`, siteCode: [{ value: s.siteNo, agencyCode: 'USGS' }] },
        variable: {
          variableCode: [{ value: s.paramCode ?? '00060', variableID: 45807197 }],
          variableName: s.paramName ?? 'Streamflow, ft&#179;/s',
          unit: { unitCode: s.unit ?? 'ft3/s' },
          noDataValue: s.noDataValue ?? -999999,
        },
        values: [
          {
            value: s.points.map((p) => ({
              value: p.value,
              qualifiers: p.qualifiers ?? ['P'],
              dateTime: p.dateTime,
            })),
            method: [{ methodID: 1 }],
          },
        ],
        name: `USGS:${s.siteNo}:${s.paramCode ?? '00060'}:00000`,
      })),
    },
  });
}

export interface RdbSite {
  siteNo: string;
  name?: string;
  siteType?: string;
  lat?: string;
  lon?: string;
  alt?: string;
  huc?: string;
}

const RDB_COLUMNS = [
  'agency_cd',
  'site_no',
  'station_nm',
  'site_tp_cd',
  'dec_lat_va',
  'dec_long_va',
  'coord_acy_cd',
  'dec_coord_datum_cd',
  'alt_va',
  'alt_acy_va',
  'alt_datum_cd',
  'huc_cd',
];

export function siteRdb(sites: RdbSite[]): string {
  const lines = [
    '#',
    '# US Geological Survey',
    '# Site listing for test fixtures',
    '#',
    RDB_COLUMNS.join('\t'),
    '5s\t15s\t50s\t7s\t16s\t16s\t1s\t10s\t8s\t3s\t10s\t16s',
    ...sites.map((s) =>
      [
        'USGS',
        s.siteNo,
        s.name ?? `TEST CREEK AT ${s.siteNo}`,
        s.siteType ?? 'ST',
        s.lat ?? '38.5',
        s.lon ?? '-77.0',
        'S',
        'NAD83',
        s.alt ?? '',
        '',
        '',
        s.huc ?? '',
      ].join('\t')
    ),
  ];
  return lines.join('\n') + '\n';
}

export function mockTextResponse(body: string, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  } as Response;
}

/** Every query parameter of a request URL, for asserting on what was sent. */
export function queryOf(url: string): Record<string, string> {
  return Object.fromEntries(new URL(url).searchParams);
}
