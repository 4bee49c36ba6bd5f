import path from 'path';
import type { FileRecord } from '../common/fileTypes';
import { invalidBaseNameReason } from '../common/path';
import { createLogger, traceLog } from '../utils/logger';

export interface TransformSpec {
  searchPattern: string;
  replacePattern: string;
  caseSensitive: boolean;
  /** Treat `searchPattern` as a regular expression instead of literal text */
  useRegex?: boolean;
}

export type CompiledTransform =
  | { kind: 'identity' }
  | { kind: 'replace'; matcher: RegExp; replacement: string };

export interface TransformCompilation {
  transform: CompiledTransform;
  warning: string | null;
}

export interface NameProposal {
  newName: string;
  /** Set when the replaced name was unusable and the original was kept */
  rejection: string | null;
}

export interface TransformOutcome {
  files: FileRecord[];
  rejectedCount: number;
  warnings: string[];
}

const logger = createLogger('transform');

export const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const compileTransform = (spec: TransformSpec): TransformCompilation => {
  if (!spec.searchPattern) {
    return { transform: { kind: 'identity' }, warning: null };
  }

  const source = spec.useRegex ? spec.searchPattern : escapeRegExp(spec.searchPattern);
  // `u` keeps `.` and classes on whole code points, never half a surrogate pair.
  const flags = spec.caseSensitive ? 'gu' : 'giu';

  try {
    return {
      transform: { kind: 'replace', matcher: new RegExp(source, flags), replacement: spec.replacePattern },
      warning: null,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Search pattern "${spec.searchPattern}" does not compile: ${message}`);
    return { transform: { kind: 'identity' }, warning: `Search regex error: ${spec.searchPattern}` };
  }
};

/**
 * Replaces every non-overlapping match, left to right. The replacement is
 * inserted verbatim: `$1` and `$&` are not expanded.
 */
export const transformName = (transform: CompiledTransform, baseName: string): string => {
  if (transform.kind === 'identity') {
    return baseName;
  }
  const { replacement } = transform;
  return baseName.replace(transform.matcher, () => replacement);
};

export const proposeName = (transform: CompiledTransform, baseName: string): NameProposal => {
  const candidate = transformName(transform, baseName);
  if (candidate === baseName) {
    return { newName: baseName, rejection: null };
  }
  const rejection = invalidBaseNameReason(candidate);
  if (rejection) {
    logger.warn(`Keeping ${baseName}: ${rejection}`);
    return { newName: baseName, rejection };
  }
  traceLog('transform', `${baseName} → ${candidate}`);
  return { newName: candidate, rejection: null };
};

export const isChanged = (record: FileRecord) => path.basename(record.originalPath) !== record.newName;

/** Recomputes `newName` for every record from its original basename. */
export const applyTransform = (records: FileRecord[], spec: TransformSpec): TransformOutcome => {
  const { transform, warning } = compileTransform(spec);
  let rejectedCount = 0;

  const files = records.map((record) => {
    const proposal = proposeName(transform, path.basename(record.originalPath));
    if (proposal.rejection) {
      rejectedCount += 1;
    }
    return {
      ...record,
      newName: proposal.newName,
      searchPattern: spec.searchPattern,
      replacePattern: spec.replacePattern,
      caseSensitive: spec.caseSensitive,
    };
  });

  return { files, rejectedCount, warnings: warning ? [warning] : [] };
};
