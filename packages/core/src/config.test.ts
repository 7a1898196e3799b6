import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig, resetConfigCache } from './config';

const originalEnv = { ...process.env };

const resetEnv = () => {
  process.env = { ...originalEnv };
  resetConfigCache();
};

describe('core/config', () => {
  afterEach(() => {
    resetEnv();
  });

  it('parses booleans and numeric values from env', () => {
    process.env.ROWFOLD_SKIP_EMPTY_LINES = 'no';
    process.env.ROWFOLD_STREAM_HIGH_WATER_MARK = '1024';
    process.env.ROWFOLD_DEFAULT_DELIMITER = '\t';
    process.env.LOG_LEVEL = 'debug';
    resetConfigCache();

    const config = loadConfig();

    expect(config.skipEmptyLines).toBe(false);
    expect(config.streamHighWaterMark).toBe(1024);
    expect(config.defaultDelimiter).toBe('\t');
    expect(config.logLevel).toBe('debug');
  });

  it('uses defaults when variables are unset', () => {
    delete process.env.LOG_LEVEL;
    delete process.env.ROWFOLD_DEFAULT_DELIMITER;
    delete process.env.ROWFOLD_STREAM_HIGH_WATER_MARK;
    delete process.env.ROWFOLD_SKIP_EMPTY_LINES;
    resetConfigCache();

    const config = loadConfig();

    expect(config.logLevel).toBe('warn');
    expect(config.defaultDelimiter).toBe(',');
    expect(config.streamHighWaterMark).toBe(65536);
    expect(config.skipEmptyLines).toBe(true);
  });

  it('accepts 1 and yes as true', () => {
    process.env.ROWFOLD_SKIP_EMPTY_LINES = 'YES';
    resetConfigCache();
    expect(loadConfig().skipEmptyLines).toBe(true);

    process.env.ROWFOLD_SKIP_EMPTY_LINES = '1';
    resetConfigCache();
    expect(loadConfig().skipEmptyLines).toBe(true);
  });

  it('rejects an empty default delimiter', () => {
    process.env.ROWFOLD_DEFAULT_DELIMITER = '';
    resetConfigCache();

    expect(() => loadConfig()).toThrow();
  });

  it('caches until reset', () => {
    process.env.ROWFOLD_DEFAULT_DELIMITER = ';';
    resetConfigCache();
    const first = loadConfig();

    process.env.ROWFOLD_DEFAULT_DELIMITER = '|';
    expect(loadConfig()).toBe(first);

    resetConfigCache();
    expect(loadConfig().defaultDelimiter).toBe('|');
  });
});
