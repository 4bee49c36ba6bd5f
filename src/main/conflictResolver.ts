import fs from 'fs/promises';
import path from 'path';
import type { FileRecord } from '../common/fileTypes';
import { comparisonKey, siblingPath, splitStemAndExtension } from '../common/path';
import type { AutoNumberResult, ConflictReport, DuplicateTargetGroup } from '../types/rename';
import { createLogger } from '../utils/logger';

export interface ConflictOptions {
  /** Compare target names without regard to case */
  caseInsensitive: boolean;
}

const logger = createLogger('conflicts');

const pathExists = async (targetPath: string) => {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
};

export const targetPathOf = (record: FileRecord) => siblingPath(record.originalPath, record.newName);

const targetKeyOf = (record: FileRecord, options: ConflictOptions) =>
  comparisonKey(targetPathOf(record), options.caseInsensitive);

const groupByTarget = (changed: FileRecord[], options: ConflictOptions) => {
  const groups = new Map<string, string[]>();
  for (const record of changed) {
    const key = targetKeyOf(record, options);
    const sources = groups.get(key);
    if (sources) {
      sources.push(record.originalPath);
    } else {
      groups.set(key, [record.originalPath]);
    }
  }
  return groups;
};

/**
 * Checks a changed-record set before any rename runs. Two records aiming at
 * the same target, or a target that already exists for another file, make the
 * whole set unsafe to apply.
 */
export const findConflicts = async (
  changed: FileRecord[],
  options: ConflictOptions,
): Promise<ConflictReport> => {
  const duplicates: DuplicateTargetGroup[] = [];
  groupByTarget(changed, options).forEach((sources, targetKey) => {
    if (sources.length > 1) {
      duplicates.push({ targetKey, sources });
    }
  });

  const collisions = await Promise.all(
    changed.map(async (record) => {
      const targetPath = targetPathOf(record);
      if (!(await pathExists(targetPath))) {
        return null;
      }
      const sameFile =
        comparisonKey(targetPath, options.caseInsensitive) ===
        comparisonKey(record.originalPath, options.caseInsensitive);
      return sameFile ? null : targetPath;
    }),
  );
  const existing = collisions.filter((targetPath): targetPath is string => targetPath !== null);

  if (duplicates.length > 0 || existing.length > 0) {
    logger.error('Collision detected', { duplicates, existing });
  }

  return { duplicates, existing };
};

export const hasConflicts = (report: ConflictReport) =>
  report.duplicates.length > 0 || report.existing.length > 0;

export const describeConflicts = (report: ConflictReport) =>
  `Conflicts detected: ${report.duplicates.length} duplicate targets, ${report.existing.length} existing-file collisions`;

/** Number of changed records whose target was already claimed earlier in the list. */
export const countDuplicateTargets = (changed: FileRecord[], options: ConflictOptions): number => {
  const seen = new Set<string>();
  let duplicates = 0;
  for (const record of changed) {
    const key = targetKeyOf(record, options);
    if (seen.has(key)) {
      duplicates += 1;
    } else {
      seen.add(key);
    }
  }
  return duplicates;
};

export const numberedName = (name: string, counter: number) => {
  const { stem, extension } = splitStemAndExtension(name);
  return `${stem} (${counter})${extension}`;
};

/**
 * Gives each changed record a name nobody else in its directory uses, by
 * appending " (2)", " (3)" … before the extension. Every scanned file's
 * original name counts as used, and each final name is reserved before the
 * next record is considered.
 */
export const autoNumber = (
  allFiles: FileRecord[],
  changed: FileRecord[],
  options: ConflictOptions,
): AutoNumberResult => {
  const usedByDirectory = new Map<string, Set<string>>();
  const usedNamesIn = (filePath: string) => {
    const directoryKey = comparisonKey(path.dirname(filePath), options.caseInsensitive);
    let used = usedByDirectory.get(directoryKey);
    if (!used) {
      used = new Set<string>();
      usedByDirectory.set(directoryKey, used);
    }
    return used;
  };

  allFiles.forEach((record) => {
    usedNamesIn(record.originalPath).add(
      comparisonKey(path.basename(record.originalPath), options.caseInsensitive),
    );
  });

  let renumberedCount = 0;
  const records = changed.map((record) => {
    const used = usedNamesIn(record.originalPath);
    let candidate = record.newName;

    if (used.has(comparisonKey(candidate, options.caseInsensitive))) {
      let counter = 2;
      while (used.has(comparisonKey(numberedName(record.newName, counter), options.caseInsensitive))) {
        counter += 1;
      }
      candidate = numberedName(record.newName, counter);
      renumberedCount += 1;
    }

    used.add(comparisonKey(candidate, options.caseInsensitive));
    return candidate === record.newName ? record : { ...record, newName: candidate };
  });

  return { records, renumberedCount };
};
