export interface FileRecord {
  /** Absolute path on disk at scan time */
  originalPath: string;
  /** Proposed bare filename, never a path */
  newName: string;
  /** Search pattern the proposal was computed with (display only) */
  searchPattern: string;
  /** Replacement text the proposal was computed with (display only) */
  replacePattern: string;
  /** Whether matching honoured case (display only) */
  caseSensitive: boolean;
  /** MIME type inferred from the extension (display only) */
  mimeType: string | null;
}

export type ScanStatus = 'loaded' | 'not-found';

export interface ScanResult {
  /** Root directory that was scanned, resolved to an absolute path */
  rootPath: string;
  status: ScanStatus;
  /** Discovered files, sorted by filename */
  files: FileRecord[];
  /** Non-fatal problems met while compiling the exclusion spec */
  warnings: string[];
}
