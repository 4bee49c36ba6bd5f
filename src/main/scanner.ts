import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import mime from 'mime-types';
import type { FileRecord, ScanResult } from '../common/fileTypes';
import { compileExclusions, isExcluded, type CompiledExclusions } from './exclusionRules';
import { createLogger, traceLog } from '../utils/logger';

export type DirectoryReader = (directoryPath: string) => Promise<Dirent[]>;

export interface ScanOptions {
  /** Descend into subdirectories; direct children only when false */
  recurse: boolean;
  /** Compiled rules, or a raw comma-separated spec */
  exclusions?: CompiledExclusions | string;
  readDirectory?: DirectoryReader;
}

interface WalkOptions {
  recurse: boolean;
  exclusions: CompiledExclusions;
  readDirectory: DirectoryReader;
  /**
   * Collection of discovered files. Mutated as the walk progresses to avoid
   * repeated array allocations.
   */
  accumulator: FileRecord[];
}

const logger = createLogger('scanner');

const readDirectoryEntries: DirectoryReader = (directoryPath) =>
  fs.readdir(directoryPath, { withFileTypes: true });

const buildFileRecord = (filePath: string): FileRecord => ({
  originalPath: filePath,
  newName: path.basename(filePath),
  searchPattern: '',
  replacePattern: '',
  caseSensitive: false,
  mimeType: mime.lookup(filePath) || null,
});

const compareCodeUnits = (a: string, b: string) => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export const compareByFileName = (a: FileRecord, b: FileRecord) =>
  compareCodeUnits(path.basename(a.originalPath), path.basename(b.originalPath)) ||
  compareCodeUnits(a.originalPath, b.originalPath);

const isDirectory = async (targetPath: string) => {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
};

const walkDirectory = async (currentPath: string, options: WalkOptions): Promise<void> => {
  let entries: Dirent[];
  try {
    entries = await options.readDirectory(currentPath);
  } catch (error) {
    // Unreadable directories are skipped while keeping the scan going.
    logger.debug(`Skipping unreadable directory ${currentPath}`, error);
    return;
  }

  await Promise.all(
    entries.map(async (entry) => {
      const entryPath = path.join(currentPath, entry.name);

      if (entry.isSymbolicLink()) {
        return;
      }

      if (entry.isDirectory()) {
        if (options.recurse) {
          await walkDirectory(entryPath, options);
        }
        return;
      }

      if (!entry.isFile()) {
        return;
      }

      if (isExcluded(options.exclusions, entryPath)) {
        return;
      }

      options.accumulator.push(buildFileRecord(entryPath));
    }),
  );
};

/**
 * Lists every regular file under `rootPath` that survives the exclusion rules.
 * A missing or non-directory root is reported through `status`, not thrown.
 */
export const scanDirectory = async (rootPath: string, options: ScanOptions): Promise<ScanResult> => {
  const exclusions =
    typeof options.exclusions === 'string' || options.exclusions === undefined
      ? compileExclusions(options.exclusions ?? '')
      : options.exclusions;
  const absoluteRoot = rootPath ? path.resolve(rootPath) : '';

  if (!absoluteRoot || !(await isDirectory(absoluteRoot))) {
    logger.info(`Directory not found: ${rootPath}`);
    return { rootPath: absoluteRoot, status: 'not-found', files: [], warnings: exclusions.warnings };
  }

  const files: FileRecord[] = [];
  await walkDirectory(absoluteRoot, {
    recurse: options.recurse,
    exclusions,
    readDirectory: options.readDirectory ?? readDirectoryEntries,
    accumulator: files,
  });

  files.sort(compareByFileName);
  traceLog('scanner', `Loaded ${files.length} files`, { root: absoluteRoot, recurse: options.recurse });

  return {
    rootPath: absoluteRoot,
    status: 'loaded',
    files,
    warnings: exclusions.warnings,
  };
};

export type { FileRecord, ScanResult } from '../common/fileTypes';
