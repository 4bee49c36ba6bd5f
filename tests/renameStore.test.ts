import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createRenameStore, type RenameStoreOptions } from '../src/state/renameStore';

describe('rename store', () => {
  let workspace: string;

  const writeFiles = (...names: string[]) =>
    Promise.all(names.map((name) => fs.writeFile(path.join(workspace, name), name)));

  const listFiles = async () => (await fs.readdir(workspace)).sort();

  const createStore = (options: RenameStoreOptions = {}) =>
    createRenameStore({
      ...options,
      inputs: { selectedDir: workspace, ...options.inputs },
      config: { concurrency: 4, channelCapacity: 64, caseInsensitiveTargets: true, ...options.config },
    });

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'rename-store-'));
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('renames every changed file and reports progress up to the total', async () => {
    await writeFiles('draft-a.md', 'draft-b.md', 'draft-c.md', 'notes.md');
    const store = createStore();
    await store.setInputs({ searchPattern: 'draft', replacePattern: 'final' });
    expect(store.getState().preview).toHaveLength(3);

    let ticks = 0;
    let lastDone = 0;
    store.subscribe((state) => {
      if (state.progress.done > lastDone) {
        ticks += 1;
      }
      lastDone = state.progress.done;
    });

    const outcome = await store.apply();

    expect(outcome).toEqual({ status: 'completed', summary: { successCount: 3, errorCount: 0 } });
    expect(ticks).toBe(3);
    const state = store.getState();
    expect(state.progress).toEqual({ total: 3, done: 3, inProgress: false });
    expect(state.status).toBe('Renamed 3 files, 0 errors');
    expect(state.preview).toEqual([]);
    expect(await listFiles()).toEqual(['final-a.md', 'final-b.md', 'final-c.md', 'notes.md']);
  });

  it('refuses the whole run when two files share a target', async () => {
    await writeFiles('a.txt', 'b.txt');
    const store = createStore({ inputs: { searchPattern: '^[ab]', replacePattern: 'same', useRegex: true } });
    const preview = await store.refresh();
    expect(preview.status).toBe('Preview updated (2 changed, 1 duplicates)');

    const outcome = await store.apply();

    expect(outcome.status).toBe('refused');
    expect(store.getState().status).toBe('Conflicts detected: 1 duplicate targets, 0 existing-file collisions');
    expect(store.getState().progress).toEqual({ total: 0, done: 0, inProgress: false });
    expect(await listFiles()).toEqual(['a.txt', 'b.txt']);
  });

  it('refuses to overwrite a file that is not being renamed', async () => {
    await writeFiles('photo.jpg', 'photo-1.jpg');
    const store = createStore({ inputs: { searchPattern: '-1', replacePattern: '' } });
    await store.refresh();

    const outcome = await store.apply();

    expect(outcome.status).toBe('refused');
    expect(store.getState().status).toBe('Conflicts detected: 0 duplicate targets, 1 existing-file collisions');
    expect(await listFiles()).toEqual(['photo-1.jpg', 'photo.jpg']);
  });

  it('applies auto-numbered names', async () => {
    await writeFiles('a.txt', 'b.txt');
    const store = createStore({
      inputs: { searchPattern: '^[ab]', replacePattern: 'same', useRegex: true, autoNumberOnConflict: true },
    });
    await store.refresh();

    const outcome = await store.apply();

    expect(outcome).toEqual({ status: 'completed', summary: { successCount: 2, errorCount: 0 } });
    expect(await listFiles()).toEqual(['same (2).txt', 'same.txt']);
  });

  it('reports when there is nothing to rename', async () => {
    await writeFiles('a.txt');
    const store = createStore();
    await store.refresh();

    expect(await store.apply()).toEqual({ status: 'empty' });
    expect(store.getState().status).toBe('No files to rename.');
  });

  it('ignores an apply request while one is running', async () => {
    await writeFiles('x-1.txt', 'x-2.txt');
    const store = createStore({ inputs: { searchPattern: 'x', replacePattern: 'y' } });
    await store.refresh();

    const first = store.apply();
    const second = await store.apply();

    expect(second).toEqual({ status: 'busy' });
    expect(await first).toEqual({ status: 'completed', summary: { successCount: 2, errorCount: 0 } });
  });

  it('counts per-file failures in the summary', async () => {
    await writeFiles('log-1.txt', 'log-2.txt');
    const store = createStore({
      inputs: { searchPattern: 'log', replacePattern: 'entry' },
      renameImpl: async (fromPath, toPath) => {
        if (fromPath.endsWith('log-2.txt')) {
          throw new Error('EBUSY: resource busy');
        }
        await fs.rename(fromPath, toPath);
      },
    });
    await store.refresh();

    const outcome = await store.apply();

    expect(outcome).toEqual({ status: 'completed', summary: { successCount: 1, errorCount: 1 } });
    expect(store.getState().status).toBe('Renamed 1 files, 1 errors');
    expect(store.getState().preview.map((record) => record.newName)).toEqual(['entry-2.txt']);
  });

  it('skips files that disappeared after the preview', async () => {
    await writeFiles('old-a.txt', 'old-b.txt', 'old-c.txt');
    const store = createStore({ inputs: { searchPattern: 'old', replacePattern: 'new' } });
    await store.refresh();
    await fs.rm(path.join(workspace, 'old-b.txt'));

    const outcome = await store.apply();

    expect(outcome).toEqual({ status: 'completed', summary: { successCount: 2, errorCount: 0 } });
    expect(store.getState().progress.total).toBe(2);
    expect(await listFiles()).toEqual(['new-a.txt', 'new-c.txt']);
  });

  it('rebuilds the preview when inputs change', async () => {
    await writeFiles('alpha.txt', 'beta.txt');
    const store = createStore();

    const first = await store.setInputs({ searchPattern: 'alpha', replacePattern: 'gamma' });
    const second = await store.setInputs({ excludePattern: 'alpha' });

    expect(first.preview).toHaveLength(1);
    expect(second.preview).toEqual([]);
    expect(store.getState().files.map((record) => record.newName)).toEqual(['beta.txt']);
    expect(store.getState().status).toBe('Preview updated (0 changed)');
  });

  it('keeps the newest preview when refreshes overlap', async () => {
    const bigDir = path.join(workspace, 'big');
    await fs.mkdir(bigDir);
    await Promise.all(
      Array.from({ length: 200 }, (_, index) => fs.writeFile(path.join(bigDir, `file-${index}.txt`), 'x')),
    );
    const store = createStore();

    const first = store.setInputs({ selectedDir: bigDir, searchPattern: 'file', replacePattern: 'doc' });
    const second = store.setInputs({ selectedDir: path.join(bigDir, 'missing') });
    await Promise.all([first, second]);

    const state = store.getState();
    expect(state.inputs.selectedDir).toBe(path.join(bigDir, 'missing'));
    expect(state.files).toEqual([]);
    expect(state.preview).toEqual([]);
    expect(state.status).toBe('Directory not found');
  });

  it('finishes the run when a listener throws', async () => {
    const names = Array.from({ length: 10 }, (_, index) => `item-${index}.txt`);
    await writeFiles(...names);
    const store = createStore({
      inputs: { searchPattern: 'item', replacePattern: 'entry' },
      config: { concurrency: 1, channelCapacity: 1 },
    });
    await store.refresh();
    store.subscribe((state) => {
      if (state.progress.done === 1) {
        throw new Error('listener failed');
      }
    });

    const outcome = await store.apply();

    expect(outcome).toEqual({ status: 'completed', summary: { successCount: 10, errorCount: 0 } });
    expect(store.getState().progress).toEqual({ total: 10, done: 10, inProgress: false });
    expect(await listFiles()).toEqual(names.map((name) => name.replace('item', 'entry')));
  });
});
