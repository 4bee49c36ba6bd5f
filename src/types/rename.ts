import type { FileRecord } from '../common/fileTypes';

export interface DuplicateTargetGroup {
  /** Normalised target path shared by every source */
  targetKey: string;
  sources: string[];
}

export interface ConflictReport {
  duplicates: DuplicateTargetGroup[];
  /** Targets that already exist on disk and belong to another file */
  existing: string[];
}

export interface AutoNumberResult {
  records: FileRecord[];
  renumberedCount: number;
}

export interface RenameSummary {
  successCount: number;
  errorCount: number;
}

export type RenameMessage =
  | { type: 'progress'; done: number }
  | { type: 'done'; summary: RenameSummary };

export interface ConversionProgress {
  total: number;
  done: number;
  inProgress: boolean;
}

export type ApplyOutcome =
  | { status: 'busy' }
  | { status: 'empty' }
  | { status: 'refused'; report: ConflictReport }
  | { status: 'completed'; summary: RenameSummary };
