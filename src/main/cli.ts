#!/usr/bin/env node
import path from 'path';
import { Command } from 'commander';
import { bold, cyan, dim, green, red, yellow } from 'colorette';
import { createRenameStore } from '../state/renameStore';
import type { FileRecord } from '../common/fileTypes';
import type { RenameInputs } from './preview';
import { compileExclusions, describeExclusionRules } from './exclusionRules';
import { isVerboseEnabled } from '../utils/logger';

interface CliOptions {
  search: string;
  replace: string;
  exclude: string;
  regex: boolean;
  caseSensitive: boolean;
  recursive: boolean;
  autoNumber: boolean;
}

export interface CliIo {
  log: (line: string) => void;
  error: (line: string) => void;
  progress?: (done: number, total: number) => void;
}

const defaultIo: CliIo = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  progress: (done, total) => {
    if (process.stdout.isTTY) {
      process.stdout.write(`\r${dim(`Renaming ${done}/${total}`)}${done === total ? '\n' : ''}`);
    }
  },
};

const toInputs = (directory: string, options: CliOptions): RenameInputs => ({
  selectedDir: directory,
  excludePattern: options.exclude,
  searchPattern: options.search,
  replacePattern: options.replace,
  caseSensitive: options.caseSensitive,
  useRegex: options.regex,
  includeSubdirectories: options.recursive,
  autoNumberOnConflict: options.autoNumber,
});

export const formatPreviewLine = (rootPath: string, record: FileRecord) => {
  const relative = path.relative(rootPath, record.originalPath);
  return `${relative} ${dim('→')} ${cyan(record.newName)}`;
};

const addRenameOptions = (command: Command) =>
  command
    .argument('<directory>', 'directory whose files are renamed')
    .option('-s, --search <pattern>', 'text to find in each filename', '')
    .option('-r, --replace <text>', 'text inserted in place of each match', '')
    .option('-x, --exclude <spec>', 'comma-separated exclusion tokens (re:…, globs, path or name fragments)', '')
    .option('--regex', 'treat the search pattern as a regular expression', false)
    .option('--case-sensitive', 'match the search pattern case-sensitively', false)
    .option('-R, --recursive', 'include files in subdirectories', false)
    .option('--auto-number', 'append (2), (3)… to names that would collide', false);

export const buildProgram = (io: CliIo = defaultIo) => {
  const program = new Command();
  program
    .name('batch-renamer')
    .description('Preview and apply search/replace renames across a directory tree')
    .version('0.1.0');

  addRenameOptions(program.command('preview'))
    .description('list the renames the current options would perform')
    .action(async (directory: string, options: CliOptions) => {
      if (isVerboseEnabled()) {
        describeExclusionRules(compileExclusions(options.exclude)).forEach((rule) => io.log(dim(`exclude ${rule}`)));
      }
      const store = createRenameStore({ inputs: toInputs(directory, options) });
      const result = await store.refresh();
      result.preview.forEach((record) => io.log(formatPreviewLine(result.scan.rootPath, record)));
      io.log(bold(result.status));
    });

  addRenameOptions(program.command('apply'))
    .description('rename files, refusing the whole run if any target collides')
    .action(async (directory: string, options: CliOptions) => {
      const store = createRenameStore({ inputs: toInputs(directory, options) });
      const result = await store.refresh();
      result.preview.forEach((record) => io.log(formatPreviewLine(result.scan.rootPath, record)));

      const unsubscribe = store.subscribe((state) => {
        if (state.progress.inProgress) {
          io.progress?.(state.progress.done, state.progress.total);
        }
      });
      try {
        const outcome = await store.apply();
        const { status } = store.getState();
        if (outcome.status === 'refused') {
          io.error(red(status));
          process.exitCode = 1;
        } else if (outcome.status === 'completed' && outcome.summary.errorCount > 0) {
          io.log(yellow(status));
        } else {
          io.log(green(status));
        }
      } finally {
        unsubscribe();
      }
    });

  return program;
};

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(red(error instanceof Error ? error.message : String(error)));
      process.exitCode = 1;
    });
}
