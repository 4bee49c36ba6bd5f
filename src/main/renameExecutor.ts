import fs from 'fs/promises';
import path from 'path';
import type { FileRecord } from '../common/fileTypes';
import { createChannel, type Channel } from '../common/channel';
import type { RenameMessage, RenameSummary } from '../types/rename';
import { targetPathOf } from './conflictResolver';
import { createLogger } from '../utils/logger';

export type RenameImpl = (fromPath: string, toPath: string) => Promise<void>;

export interface RenameExecutionOptions {
  /** Upper bound on renames in flight */
  concurrency: number;
  channel: Channel<RenameMessage>;
  renameImpl?: RenameImpl;
}

export interface DispatchOptions {
  concurrency: number;
  channelCapacity: number;
  renameImpl?: RenameImpl;
}

export interface RenameDispatch {
  messages: AsyncIterable<RenameMessage>;
  /** Settles after the summary message has been sent */
  completion: Promise<RenameSummary>;
}

const logger = createLogger('executor');

const pathExists = async (targetPath: string) => {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
};

/** Keeps records that still change a name and whose source is still on disk. */
export const prepareRenames = async (records: FileRecord[]): Promise<FileRecord[]> => {
  const candidates = records.filter((record) => path.basename(record.originalPath) !== record.newName);
  const present = await Promise.all(candidates.map((record) => pathExists(record.originalPath)));
  return candidates.filter((_, index) => present[index]);
};

/**
 * Renames every record on a pool of `concurrency` lanes. Each attempt, failed
 * or not, bumps the completed count and sends it as a progress message; a
 * single summary message follows the last attempt and the channel is closed.
 * Renames are independent: a failure neither stops nor rolls back the others.
 */
export const executeRenames = async (
  records: FileRecord[],
  options: RenameExecutionOptions,
): Promise<RenameSummary> => {
  const renameImpl = options.renameImpl ?? fs.rename;
  const laneCount = Math.max(1, Math.min(options.concurrency, records.length));
  let nextIndex = 0;
  let completed = 0;
  let successCount = 0;
  let errorCount = 0;

  const runLane = async () => {
    while (nextIndex < records.length) {
      const record = records[nextIndex];
      nextIndex += 1;
      const targetPath = targetPathOf(record);
      try {
        await renameImpl(record.originalPath, targetPath);
        successCount += 1;
      } catch (error: unknown) {
        errorCount += 1;
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Rename failed ${record.originalPath} → ${targetPath}: ${message}`);
      }
      completed += 1;
      await options.channel.send({ type: 'progress', done: completed });
    }
  };

  try {
    await Promise.all(Array.from({ length: laneCount }, () => runLane()));
    const summary: RenameSummary = { successCount, errorCount };
    logger.info(`Renamed ${successCount} files, ${errorCount} errors`);
    await options.channel.send({ type: 'done', summary });
    return summary;
  } finally {
    options.channel.close();
  }
};

/**
 * Starts `executeRenames` on a later turn of the event loop so the caller
 * returns immediately and observes the run only through `messages`.
 */
export const dispatchRenames = (records: FileRecord[], options: DispatchOptions): RenameDispatch => {
  const channel = createChannel<RenameMessage>(options.channelCapacity);
  const completion = new Promise<void>((resolve) => {
    setImmediate(resolve);
  }).then(() =>
    executeRenames(records, {
      concurrency: options.concurrency,
      channel,
      renameImpl: options.renameImpl,
    }),
  );
  return { messages: channel, completion };
};
