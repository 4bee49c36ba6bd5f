import util from 'util';
import log from 'electron-log/node';
import { bold, cyan, dim, magenta, yellow } from 'colorette';
import { resolveLogSettings } from '../main/config';

const config = resolveLogSettings();

log.transports.console.level = config.logLevel;
log.transports.file.level = config.logToFile ? config.logLevel : false;

export type ScopedLogger = ReturnType<typeof log.scope>;

const scopes = new Map<string, ScopedLogger>();

export const createLogger = (scope: string): ScopedLogger => {
  const existing = scopes.get(scope);
  if (existing) return existing;
  const logger = log.scope(scope);
  scopes.set(scope, logger);
  return logger;
};

const TAG_COLOURS: Record<string, (text: string) => string> = {
  scanner: cyan,
  exclusion: yellow,
  transform: magenta,
};

const timestamp = () => dim(new Date().toISOString());

const formatValue = (value: unknown) =>
  typeof value === 'string' ? value : util.inspect(value, { colors: true, depth: 4, breakLength: 80 });

export const isVerboseEnabled = () => config.verbose;

/**
 * Coloured per-entry trace for debugging exclusion and transform decisions.
 * Silent unless RENAMER_LOG_VERBOSE is set.
 */
export const traceLog = (tag: string, message: string, details: Record<string, unknown> = {}) => {
  if (!config.verbose) return;
  const colour = TAG_COLOURS[tag] ?? bold;
  const lines = [`${timestamp()} ${colour(`[${tag}]`)} ${message}`];
  Object.entries(details).forEach(([key, value]) => {
    lines.push(`   ${dim(`${key}:`)} ${formatValue(value)}`);
  });
  // eslint-disable-next-line no-console
  lines.forEach((line) => console.log(line));
};
