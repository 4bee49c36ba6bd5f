import type { FileRecord, ScanResult } from '../common/fileTypes';
import { scanDirectory } from './scanner';
import { applyTransform, isChanged } from './nameTransformer';
import { autoNumber, countDuplicateTargets } from './conflictResolver';

export interface RenameInputs {
  selectedDir: string;
  excludePattern: string;
  searchPattern: string;
  replacePattern: string;
  caseSensitive: boolean;
  useRegex: boolean;
  includeSubdirectories: boolean;
  autoNumberOnConflict: boolean;
}

export interface PreviewOptions {
  caseInsensitiveTargets: boolean;
}

export interface PreviewResult {
  scan: ScanResult;
  /** Every scanned file with its proposed name */
  files: FileRecord[];
  /** Files whose proposed name differs from the current one */
  preview: FileRecord[];
  duplicateCount: number;
  renumberedCount: number;
  rejectedCount: number;
  warnings: string[];
  status: string;
}

export const DEFAULT_INPUTS: RenameInputs = {
  selectedDir: '',
  excludePattern: '',
  searchPattern: '',
  replacePattern: '',
  caseSensitive: false,
  useRegex: false,
  includeSubdirectories: false,
  autoNumberOnConflict: false,
};

interface StatusParts {
  found: boolean;
  changedCount: number;
  duplicateCount: number;
  renumberedCount: number;
  rejectedCount: number;
  autoNumber: boolean;
  warnings: string[];
}

export const formatPreviewStatus = (parts: StatusParts) => {
  let headline: string;
  if (!parts.found) {
    headline = 'Directory not found';
  } else {
    const counts = [`${parts.changedCount} changed`];
    if (parts.autoNumber && parts.renumberedCount > 0) {
      counts.push(`${parts.renumberedCount} renumbered`);
    } else if (!parts.autoNumber && parts.duplicateCount > 0) {
      counts.push(`${parts.duplicateCount} duplicates`);
    }
    if (parts.rejectedCount > 0) {
      counts.push(`${parts.rejectedCount} rejected`);
    }
    headline = `Preview updated (${counts.join(', ')})`;
  }
  return [headline, ...parts.warnings].join(' | ');
};

/**
 * Scans, transforms and resolves names for one set of inputs. Nothing is
 * cached: each call reflects the filesystem as it is now.
 */
export const buildPreview = async (inputs: RenameInputs, options: PreviewOptions): Promise<PreviewResult> => {
  const scan = await scanDirectory(inputs.selectedDir, {
    recurse: inputs.includeSubdirectories,
    exclusions: inputs.excludePattern,
  });

  const transformed = applyTransform(scan.files, {
    searchPattern: inputs.searchPattern,
    replacePattern: inputs.replacePattern,
    caseSensitive: inputs.caseSensitive,
    useRegex: inputs.useRegex,
  });

  let files = transformed.files;
  let preview = files.filter(isChanged);
  const conflictOptions = { caseInsensitive: options.caseInsensitiveTargets };
  const duplicateCount = countDuplicateTargets(preview, conflictOptions);
  let renumberedCount = 0;

  if (inputs.autoNumberOnConflict && preview.length > 0) {
    const numbered = autoNumber(files, preview, conflictOptions);
    renumberedCount = numbered.renumberedCount;
    preview = numbered.records;
    const renamedByPath = new Map(preview.map((record): [string, FileRecord] => [record.originalPath, record]));
    files = files.map((record) => renamedByPath.get(record.originalPath) ?? record);
  }

  const warnings = [...scan.warnings, ...transformed.warnings];

  return {
    scan,
    files,
    preview,
    duplicateCount,
    renumberedCount,
    rejectedCount: transformed.rejectedCount,
    warnings,
    status: formatPreviewStatus({
      found: scan.status === 'loaded',
      changedCount: preview.length,
      duplicateCount,
      renumberedCount,
      rejectedCount: transformed.rejectedCount,
      autoNumber: inputs.autoNumberOnConflict,
      warnings,
    }),
  };
};
