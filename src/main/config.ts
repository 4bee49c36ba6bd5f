import os from 'os';

export type LogLevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface RenamerConfig {
  /** Upper bound on renames in flight at once */
  concurrency: number;
  /**
   * Treat target names as equal when they differ only by case. Matches the
   * default behaviour of the Windows and macOS filesystems.
   */
  caseInsensitiveTargets: boolean;
  /** Messages the progress channel buffers before workers wait */
  channelCapacity: number;
  logLevel: LogLevelName;
  logToFile: boolean;
  verbose: boolean;
}

const LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const DEFAULT_CHANNEL_CAPACITY = 64;

const isLogLevel = (value: string): value is LogLevelName =>
  (LOG_LEVELS as readonly string[]).includes(value);

export const coerceBoolean = (value: unknown, fallback = false): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    if (!normalised) return fallback;
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return fallback;
};

const parsePositiveInteger = (raw: string | undefined, name: string, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const ensurePositiveInteger = (value: number, name: string) => {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
};

const resolveLogLevel = (raw: string | undefined): LogLevelName => {
  if (!raw) return 'warn';
  const normalised = raw.trim().toLowerCase();
  if (!isLogLevel(normalised)) {
    throw new Error(`RENAMER_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return normalised;
};

export type LogSettings = Pick<RenamerConfig, 'logLevel' | 'logToFile' | 'verbose'>;

/** Reads only the logging variables, so a bad worker setting cannot break logging. */
export const resolveLogSettings = (env: NodeJS.ProcessEnv = process.env): LogSettings => ({
  logLevel: resolveLogLevel(env.RENAMER_LOG_LEVEL),
  logToFile: coerceBoolean(env.RENAMER_LOG_FILE),
  verbose: coerceBoolean(env.RENAMER_LOG_VERBOSE),
});

export const defaultConcurrency = () => Math.max(1, os.availableParallelism());

export const resolveRenamerConfig = (
  overrides: Partial<RenamerConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): RenamerConfig => {
  // Variables an override replaces are never parsed.
  const merged: RenamerConfig = {
    concurrency:
      overrides.concurrency ??
      parsePositiveInteger(env.RENAMER_CONCURRENCY, 'RENAMER_CONCURRENCY', defaultConcurrency()),
    caseInsensitiveTargets:
      overrides.caseInsensitiveTargets ?? coerceBoolean(env.RENAMER_CASE_INSENSITIVE_TARGETS, true),
    channelCapacity:
      overrides.channelCapacity ??
      parsePositiveInteger(env.RENAMER_CHANNEL_CAPACITY, 'RENAMER_CHANNEL_CAPACITY', DEFAULT_CHANNEL_CAPACITY),
    logLevel: overrides.logLevel ?? resolveLogLevel(env.RENAMER_LOG_LEVEL),
    logToFile: overrides.logToFile ?? coerceBoolean(env.RENAMER_LOG_FILE),
    verbose: overrides.verbose ?? coerceBoolean(env.RENAMER_LOG_VERBOSE),
  };
  ensurePositiveInteger(merged.concurrency, 'concurrency');
  ensurePositiveInteger(merged.channelCapacity, 'channelCapacity');
  return merged;
};
