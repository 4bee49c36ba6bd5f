import os from 'os';
import { coerceBoolean, resolveLogSettings, resolveRenamerConfig } from '../main/config';

describe('resolveRenamerConfig', () => {
  it('falls back to defaults when the environment is empty', () => {
    expect(resolveRenamerConfig({}, {})).toEqual({
      concurrency: Math.max(1, os.availableParallelism()),
      caseInsensitiveTargets: true,
      channelCapacity: 64,
      logLevel: 'warn',
      logToFile: false,
      verbose: false,
    });
  });

  it('reads values from the environment', () => {
    const config = resolveRenamerConfig(
      {},
      {
        RENAMER_CONCURRENCY: '3',
        RENAMER_CASE_INSENSITIVE_TARGETS: 'false',
        RENAMER_CHANNEL_CAPACITY: '8',
        RENAMER_LOG_LEVEL: 'DEBUG',
        RENAMER_LOG_FILE: 'yes',
        RENAMER_LOG_VERBOSE: '1',
      },
    );

    expect(config).toEqual({
      concurrency: 3,
      caseInsensitiveTargets: false,
      channelCapacity: 8,
      logLevel: 'debug',
      logToFile: true,
      verbose: true,
    });
  });

  it('lets explicit overrides win over the environment', () => {
    const config = resolveRenamerConfig({ concurrency: 1 }, { RENAMER_CONCURRENCY: '6' });
    expect(config.concurrency).toBe(1);
  });

  it('rejects invalid numbers and log levels', () => {
    expect(() => resolveRenamerConfig({}, { RENAMER_CONCURRENCY: '0' })).toThrow(
      'RENAMER_CONCURRENCY must be a positive integer, got "0"',
    );
    expect(() => resolveRenamerConfig({ channelCapacity: 1.5 }, {})).toThrow(
      'channelCapacity must be a positive integer, got 1.5',
    );
    expect(() => resolveRenamerConfig({}, { RENAMER_LOG_LEVEL: 'loud' })).toThrow(
      'RENAMER_LOG_LEVEL must be one of error, warn, info, verbose, debug, silly, got "loud"',
    );
  });
});

describe('resolveLogSettings', () => {
  const savedConcurrency = process.env.RENAMER_CONCURRENCY;

  afterEach(() => {
    if (savedConcurrency === undefined) {
      delete process.env.RENAMER_CONCURRENCY;
    } else {
      process.env.RENAMER_CONCURRENCY = savedConcurrency;
    }
  });

  it('ignores settings that only concern the rename workers', () => {
    expect(resolveLogSettings({ RENAMER_CONCURRENCY: 'many', RENAMER_LOG_VERBOSE: 'on' })).toEqual({
      logLevel: 'warn',
      logToFile: false,
      verbose: true,
    });
  });

  it('lets the logger load while the worker settings are invalid', () => {
    process.env.RENAMER_CONCURRENCY = '0';

    expect(() =>
      jest.isolateModules(() => {
        require('../utils/logger');
      }),
    ).not.toThrow();
    expect(resolveRenamerConfig({ concurrency: 2 }).concurrency).toBe(2);
  });
});

describe('coerceBoolean', () => {
  it('understands common spellings', () => {
    expect(coerceBoolean('on')).toBe(true);
    expect(coerceBoolean(' TRUE ')).toBe(true);
    expect(coerceBoolean('off', true)).toBe(false);
    expect(coerceBoolean('', true)).toBe(true);
    expect(coerceBoolean(undefined, true)).toBe(true);
    expect(coerceBoolean(0)).toBe(false);
  });
});
