import { describe, it, expect } from 'vitest';
import { ValidationError } from '@mdd/contracts';
import { getConfigSummary, loadConfig, parseDownloadOptions } from '../src/config/index.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logging: { level: 'info', format: 'pretty' },
      providers: {
        polygon: { baseUrl: 'https://api.polygon.io' },
        twelvedata: { baseUrl: 'https://api.twelvedata.com' },
      },
      download: { outputDir: 'output', timeoutMs: 30000 },
    });
  });

  it('maps environment variables onto the schema', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      LOG_FILE: 'logs/run.log',
      POLYGON_API_KEY: 'test-polygon-key',
      TWELVEDATA_API_KEY: 'test-twelvedata-key',
      POLYGON_BASE_URL: 'http://localhost:9999',
      OUTPUT_DIR: 'data',
      REQUEST_TIMEOUT_MS: '5000',
    });

    expect(config.logging).toEqual({ level: 'debug', format: 'json', filePath: 'logs/run.log' });
    expect(config.providers.polygon).toEqual({ apiKey: 'test-polygon-key', baseUrl: 'http://localhost:9999' });
    expect(config.providers.twelvedata.apiKey).toBe('test-twelvedata-key');
    expect(config.download).toEqual({ outputDir: 'data', timeoutMs: 5000 });
  });

  it('keeps numeric-looking keys as strings', () => {
    expect(loadConfig({ POLYGON_API_KEY: '12345' }).providers.polygon.apiKey).toBe('12345');
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ POLYGON_API_KEY: '', OUTPUT_DIR: '  ' }).providers.polygon.apiKey).toBeUndefined();
  });

  it('lists every invalid setting with its variable', () => {
    try {
      loadConfig({ LOG_LEVEL: 'loud', REQUEST_TIMEOUT_MS: '-1' });
      expect.unreachable('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof Error) {
        const lines = error.message.split('\n');
        expect(lines[0]).toBe('Configuration validation failed:');
        expect(lines[1]).toMatch(/^LOG_LEVEL \(logging\.level\): /);
        expect(lines[2]).toMatch(/^REQUEST_TIMEOUT_MS \(download\.timeoutMs\): /);
      }
    }
  });

  it('summarizes without exposing keys', () => {
    const summary = getConfigSummary(loadConfig({ POLYGON_API_KEY: 'test-secret' }));
    expect(JSON.stringify(summary)).not.toContain('test-secret');
    expect(summary['providers']).toMatchObject({ polygon: { apiKey: 'set' }, twelvedata: { apiKey: 'unset' } });
  });
});

describe('parseDownloadOptions', () => {
  const base = { ticker: 'AAPL', from: '2024-01-01', to: '2024-01-02' };

  it('fills defaults', () => {
    expect(parseDownloadOptions(base)).toEqual({
      ...base,
      format: 'csv',
      granularity: 'minute',
      provider: 'polygon',
      splitByDay: false,
      header: true,
      timestampFormat: 'iso',
      rateLimitWaitSecs: 12,
      maxRetries: 3,
    });
  });

  it('coerces numeric strings from the command line', () => {
    const options = parseDownloadOptions({
      ...base,
      maxDecimals: '2',
      rateLimitWaitSecs: '0.5',
      maxRetries: '0',
      timeoutMs: '1000',
    });

    expect(options.maxDecimals).toBe(2);
    expect(options.rateLimitWaitSecs).toBe(0.5);
    expect(options.maxRetries).toBe(0);
    expect(options.timeoutMs).toBe(1000);
  });

  it('rejects bad values', () => {
    expect(() => parseDownloadOptions({ ...base, format: 'xml' })).toThrow(ValidationError);
    expect(() => parseDownloadOptions({ ...base, maxDecimals: '-1' })).toThrow(/^Invalid options:\nmaxDecimals: /);
    expect(() => parseDownloadOptions({ ...base, maxRetries: 'many' })).toThrow(ValidationError);
  });

  it('drops unknown keys', () => {
    expect(parseDownloadOptions({ ...base, verbose: 2 })).not.toHaveProperty('verbose');
  });
});
