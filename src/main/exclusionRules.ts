import path from 'path';
import picomatch from 'picomatch';
import { createLogger, traceLog } from '../utils/logger';

export type ExclusionRule =
  | { kind: 'regex'; token: string; matcher: RegExp }
  | { kind: 'glob'; token: string; matcher: (candidate: string) => boolean }
  | { kind: 'path-substring'; token: string; needle: string }
  | { kind: 'filename-substring'; token: string; needle: string };

export type ExclusionKind = ExclusionRule['kind'];

export interface CompiledExclusions {
  rules: ExclusionRule[];
  /** Tokens that failed to compile, rendered for the status line */
  warnings: string[];
}

const REGEX_PREFIX = 're:';
const GLOB_METACHARACTERS = ['*', '?', '[', '{'];

const logger = createLogger('exclusion');

const toForwardSlashes = (value: string) => value.replace(/\\/g, '/');

const hasGlobMeta = (token: string) => GLOB_METACHARACTERS.some((meta) => token.includes(meta));

const hasSeparator = (token: string) => token.includes('/') || token.includes('\\');

const isAbsoluteGlob = (pattern: string) => pattern.startsWith('/') || /^[A-Za-z]:\//.test(pattern);

const anchorGlob = (token: string) => {
  const pattern = toForwardSlashes(token);
  if (isAbsoluteGlob(pattern) || pattern.startsWith('**/')) {
    return pattern;
  }
  return `**/${pattern}`;
};

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const splitExclusionSpec = (spec: string): string[] =>
  spec
    .split(',')
    .map((token) => token.trim())
    .filter(Boolean);

const compileToken = (token: string, warnings: string[]): ExclusionRule | null => {
  if (token.toLowerCase().startsWith(REGEX_PREFIX)) {
    const pattern = token.slice(REGEX_PREFIX.length);
    try {
      return { kind: 'regex', token, matcher: new RegExp(pattern, 'i') };
    } catch (error) {
      warnings.push(`Exclude regex error: ${pattern}`);
      logger.warn(`Ignoring exclusion regex "${pattern}": ${describeError(error)}`);
      return null;
    }
  }

  if (hasGlobMeta(token)) {
    try {
      // `bash` lets a single `*` cross separators, so a glob tests the whole path.
      const matcher = picomatch(anchorGlob(token), { bash: true, nocase: true, dot: true, strictBrackets: true });
      return { kind: 'glob', token, matcher };
    } catch (error) {
      warnings.push(`Exclude glob error: ${token}`);
      logger.warn(`Ignoring exclusion glob "${token}": ${describeError(error)}`);
      return null;
    }
  }

  if (hasSeparator(token)) {
    return { kind: 'path-substring', token, needle: toForwardSlashes(token).toLowerCase() };
  }

  return { kind: 'filename-substring', token, needle: token.toLowerCase() };
};

/**
 * Classifies each comma-separated token once. Tokens that fail to compile are
 * dropped and reported through `warnings`; they never exclude anything.
 */
export const compileExclusions = (spec: string): CompiledExclusions => {
  const warnings: string[] = [];
  const rules = splitExclusionSpec(spec)
    .map((token) => compileToken(token, warnings))
    .filter((rule): rule is ExclusionRule => rule !== null);
  return { rules, warnings };
};

const matchesRule = (rule: ExclusionRule, fullPath: string, portablePath: string, baseName: string) => {
  switch (rule.kind) {
    case 'regex':
      return rule.matcher.test(fullPath);
    case 'glob':
      return rule.matcher(portablePath);
    case 'path-substring':
      return portablePath.toLowerCase().includes(rule.needle);
    case 'filename-substring':
      return baseName.toLowerCase().includes(rule.needle);
    default: {
      const exhaustive: never = rule;
      throw new Error(`Unsupported exclusion rule ${JSON.stringify(exhaustive)}`);
    }
  }
};

/** Returns the first rule that excludes `fullPath`, or null when it stays eligible. */
export const findExcludingRule = (
  exclusions: CompiledExclusions,
  fullPath: string,
): ExclusionRule | null => {
  if (exclusions.rules.length === 0) {
    return null;
  }
  const portablePath = toForwardSlashes(fullPath);
  const baseName = path.basename(fullPath);
  const match = exclusions.rules.find((rule) => matchesRule(rule, fullPath, portablePath, baseName));
  if (match) {
    traceLog('exclusion', `Excluded ${fullPath}`, { reason: match.kind, token: match.token });
  }
  return match ?? null;
};

export const isExcluded = (exclusions: CompiledExclusions, fullPath: string): boolean =>
  findExcludingRule(exclusions, fullPath) !== null;

export const describeExclusionRules = (exclusions: CompiledExclusions): string[] =>
  exclusions.rules.map((rule) => `${rule.kind}: ${rule.token}`);
