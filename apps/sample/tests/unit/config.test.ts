import { afterEach, describe, expect, it } from 'vitest';

import { getConfig, loadConfig, resetConfigForTests } from '../../src/config';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      failureRatePercent: 11,
      fastIntervalMs: 5000,
      removeOnFailure: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      LOG_LEVEL: ' DEBUG ',
      SAMPLE_FAILURE_RATE_PERCENT: '0',
      SAMPLE_FAST_INTERVAL_MS: '250',
      SAMPLE_REMOVE_ON_FAILURE: 'yes',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      failureRatePercent: 0,
      fastIntervalMs: 250,
      removeOnFailure: true,
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ SAMPLE_FAST_INTERVAL_MS: '  ', LOG_LEVEL: '' }).fastIntervalMs).toBe(5000);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent (got "verbose")',
    );
  });

  it('rejects a failure rate outside 0-100', () => {
    expect(() => loadConfig({ SAMPLE_FAILURE_RATE_PERCENT: '101' })).toThrow(
      'SAMPLE_FAILURE_RATE_PERCENT must be an integer between 0 and 100 (got "101")',
    );
  });

  it('rejects a non-positive fast interval', () => {
    expect(() => loadConfig({ SAMPLE_FAST_INTERVAL_MS: '0' })).toThrow(
      'SAMPLE_FAST_INTERVAL_MS must be an integer >= 1 (got "0")',
    );
    expect(() => loadConfig({ SAMPLE_FAST_INTERVAL_MS: '1.5' })).toThrow(
      'SAMPLE_FAST_INTERVAL_MS must be an integer >= 1 (got "1.5")',
    );
  });

  it('rejects an unrecognised boolean', () => {
    expect(() => loadConfig({ SAMPLE_REMOVE_ON_FAILURE: 'maybe' })).toThrow(
      'SAMPLE_REMOVE_ON_FAILURE must be a boolean (got "maybe")',
    );
  });
});

describe('getConfig', () => {
  const original = process.env.SAMPLE_FAST_INTERVAL_MS;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.SAMPLE_FAST_INTERVAL_MS;
    } else {
      process.env.SAMPLE_FAST_INTERVAL_MS = original;
    }
    resetConfigForTests();
  });

  it('caches the first load until reset', () => {
    resetConfigForTests();
    process.env.SAMPLE_FAST_INTERVAL_MS = '1234';
    expect(getConfig().fastIntervalMs).toBe(1234);

    process.env.SAMPLE_FAST_INTERVAL_MS = '4321';
    expect(getConfig().fastIntervalMs).toBe(1234);

    resetConfigForTests();
    expect(getConfig().fastIntervalMs).toBe(4321);
  });
});
