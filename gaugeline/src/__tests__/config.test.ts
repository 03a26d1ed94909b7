import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { FatalError } from '../core/errors.js';

const NOW = new Date('2024-06-01T00:00:00.000Z');

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({}, NOW);

    expect(config).toEqual({
      baseUrl: 'https://waterservices.usgs.gov/nwis',
      apiKey: null,
      timeoutMs: 30000,
      retry: { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 30000 },
      requestIntervalMs: 200,
      concurrency: 8,
      partitionConcurrency: 1,
      sitesPerRequest: 100,
      windowDays: 30,
      parameterCodes: ['00060', '00065'],
      siteTypes: ['ST'],
      dateRange: { start: new Date('2021-06-02T00:00:00.000Z'), end: NOW },
      dataDir: new URL('../../data', import.meta.url).pathname,
      resumeMaxAgeHours: 24,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig(
      {
        NWIS_BASE_URL: 'https://nwis.test/nwis/',
        NWIS_API_KEY: 'test-secret',
        NWIS_MAX_ATTEMPTS: '2',
        NWIS_SITES_PER_REQUEST: '50',
        NWIS_PARAMETER_CODES: '00060, 00010 ,',
        NWIS_SITE_TYPES: 'ST,LK',
        NWIS_START_DATE: '2024-01-01',
        NWIS_END_DATE: '2024-02-01',
        GAUGELINE_DATA_DIR: '/tmp/gaugeline',
      },
      NOW
    );

    expect(config.baseUrl).toBe('https://nwis.test/nwis');
    expect(config.apiKey).toBe('test-secret');
    expect(config.retry.maxAttempts).toBe(2);
    expect(config.sitesPerRequest).toBe(50);
    expect(config.parameterCodes).toEqual(['00060', '00010']);
    expect(config.siteTypes).toEqual(['ST', 'LK']);
    expect(config.dateRange).toEqual({
      start: new Date('2024-01-01T00:00:00.000Z'),
      end: new Date('2024-02-01T00:00:00.000Z'),
    });
    expect(config.dataDir).toBe('/tmp/gaugeline');
  });

  it('keeps every site type for *', () => {
    expect(loadConfig({ NWIS_SITE_TYPES: '*' }, NOW).siteTypes).toEqual([]);
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ NWIS_API_KEY: '', NWIS_CONCURRENCY: '  ' }, NOW);

    expect(config.apiKey).toBeNull();
    expect(config.concurrency).toBe(8);
  });

  it('counts the default start back from the configured end', () => {
    const config = loadConfig({ NWIS_END_DATE: '2020-01-01T00:00:00Z' }, NOW);

    expect(config.dateRange.start.toISOString()).toBe('2017-01-01T00:00:00.000Z');
  });

  it('rejects values out of range', () => {
    const load = () => loadConfig({ NWIS_SITES_PER_REQUEST: '250', NWIS_CONCURRENCY: 'many' }, NOW);

    expect(load).toThrow(FatalError);
    expect(load).toThrow(/NWIS_CONCURRENCY/);
    expect(load).toThrow(/NWIS_SITES_PER_REQUEST/);
  });

  it('rejects a start after the end', () => {
    expect(() => loadConfig({ NWIS_START_DATE: '2024-03-01', NWIS_END_DATE: '2024-02-01' }, NOW)).toThrow(
      'NWIS_START_DATE (2024-03-01T00:00:00.000Z) is after NWIS_END_DATE (2024-02-01T00:00:00.000Z)'
    );
  });

  it('rejects an unparseable date', () => {
    expect(() => loadConfig({ NWIS_START_DATE: 'last spring' }, NOW)).toThrow(/NWIS_START_DATE: must be an ISO-8601 date/);
  });
});
