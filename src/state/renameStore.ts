import type { FileRecord } from '../common/fileTypes';
import { resolveRenamerConfig, type RenamerConfig } from '../main/config';
import { buildPreview, DEFAULT_INPUTS, type PreviewResult, type RenameInputs } from '../main/preview';
import { describeConflicts, findConflicts, hasConflicts } from '../main/conflictResolver';
import { dispatchRenames, prepareRenames, type RenameImpl } from '../main/renameExecutor';
import type { ApplyOutcome, ConversionProgress, RenameMessage, RenameSummary } from '../types/rename';
import { createLogger } from '../utils/logger';

export interface RenameState {
  inputs: RenameInputs;
  files: FileRecord[];
  preview: FileRecord[];
  status: string;
  progress: ConversionProgress;
}

export interface RenameStoreOptions {
  inputs?: Partial<RenameInputs>;
  config?: Partial<RenamerConfig>;
  renameImpl?: RenameImpl;
}

export interface RenameStore {
  getState: () => RenameState;
  subscribe: (listener: (state: RenameState) => void) => () => void;
  /** Replaces the given inputs and recomputes the preview. */
  setInputs: (inputs: Partial<RenameInputs>) => Promise<PreviewResult>;
  refresh: () => Promise<PreviewResult>;
  /** Validates and renames the current preview; a call while one runs is ignored. */
  apply: () => Promise<ApplyOutcome>;
}

const logger = createLogger('store');

export const formatSummaryStatus = (summary: RenameSummary) =>
  `Renamed ${summary.successCount} files, ${summary.errorCount} errors`;

export const createRenameStore = (options: RenameStoreOptions = {}): RenameStore => {
  const config = resolveRenamerConfig(options.config);
  let applying = false;
  // Bumped by every recompute; only the latest one may write its result.
  let generation = 0;

  let state: RenameState = {
    inputs: { ...DEFAULT_INPUTS, ...options.inputs },
    files: [],
    preview: [],
    status: 'Ready',
    progress: { total: 0, done: 0, inProgress: false },
  };

  const listeners = new Set<(s: RenameState) => void>();

  const update = (partial: Partial<RenameState> | ((current: RenameState) => Partial<RenameState>)) => {
    const partialState = typeof partial === 'function' ? partial(state) : partial;
    state = { ...state, ...partialState };
    listeners.forEach((listener) => {
      try {
        listener(state);
      } catch (error: unknown) {
        logger.error('State listener failed', error);
      }
    });
  };

  const recompute = async (keepStatus: boolean) => {
    generation += 1;
    const started = generation;
    const result = await buildPreview(state.inputs, {
      caseInsensitiveTargets: config.caseInsensitiveTargets,
    });
    if (started !== generation) {
      return result;
    }
    update((current) => ({
      files: result.files,
      preview: result.preview,
      status: keepStatus ? current.status : result.status,
    }));
    return result;
  };

  const consume = async (messages: AsyncIterable<RenameMessage>) => {
    for await (const message of messages) {
      if (message.type === 'progress') {
        update((current) => ({
          progress: { ...current.progress, done: Math.max(current.progress.done, message.done) },
        }));
      } else {
        update((current) => ({
          status: formatSummaryStatus(message.summary),
          progress: { ...current.progress, inProgress: false },
        }));
      }
    }
  };

  const apply = async (): Promise<ApplyOutcome> => {
    if (applying || state.progress.inProgress) {
      return { status: 'busy' };
    }
    applying = true;
    try {
      const records = await prepareRenames(state.files);
      if (records.length === 0) {
        update({ status: 'No files to rename.' });
        return { status: 'empty' };
      }

      const report = await findConflicts(records, { caseInsensitive: config.caseInsensitiveTargets });
      if (hasConflicts(report)) {
        update({ status: describeConflicts(report) });
        return { status: 'refused', report };
      }

      update({ progress: { total: records.length, done: 0, inProgress: true } });
      const { messages, completion } = dispatchRenames(records, {
        concurrency: config.concurrency,
        channelCapacity: config.channelCapacity,
        renameImpl: options.renameImpl,
      });

      let summary: RenameSummary;
      try {
        [, summary] = await Promise.all([consume(messages), completion]);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Rename run aborted: ${message}`);
        update((current) => ({
          status: `Rename failed: ${message}`,
          progress: { ...current.progress, inProgress: false },
        }));
        throw error;
      }

      await recompute(true);
      return { status: 'completed', summary };
    } finally {
      applying = false;
    }
  };

  return {
    getState: () => state,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    async setInputs(inputs) {
      update((current) => ({ inputs: { ...current.inputs, ...inputs } }));
      return recompute(false);
    },
    refresh: () => recompute(false),
    apply,
  };
};
