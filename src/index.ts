export type { FileRecord, ScanResult, ScanStatus } from './common/fileTypes';
export { createChannel, type Channel } from './common/channel';
export {
  compileExclusions,
  describeExclusionRules,
  findExcludingRule,
  isExcluded,
  type CompiledExclusions,
  type ExclusionKind,
  type ExclusionRule,
} from './main/exclusionRules';
export { scanDirectory, type ScanOptions } from './main/scanner';
export {
  applyTransform,
  compileTransform,
  isChanged,
  proposeName,
  transformName,
  type CompiledTransform,
  type TransformSpec,
} from './main/nameTransformer';
export {
  autoNumber,
  countDuplicateTargets,
  describeConflicts,
  findConflicts,
  hasConflicts,
  type ConflictOptions,
} from './main/conflictResolver';
export { dispatchRenames, executeRenames, prepareRenames, type RenameImpl } from './main/renameExecutor';
export { buildPreview, DEFAULT_INPUTS, type PreviewResult, type RenameInputs } from './main/preview';
export { resolveRenamerConfig, type RenamerConfig } from './main/config';
export { createRenameStore, type RenameState, type RenameStore } from './state/renameStore';
export type * from './types/rename';
