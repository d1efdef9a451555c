import { describe, expect, test } from 'vitest';

import type { RewriteOptions } from '../../types';
import { defineRule, defineShape } from '../../types';
import { rewriteFiles, runFileTransform, substituteFiles } from '..';
import { createMemoryBackup, createMemoryStore } from './memory';

const options: RewriteOptions = {
  shapes: [
    defineShape({
      marker: '&Widget',
      rules: [defineRule({ requiredFieldNames: ['Name', 'Size'], helperName: 'newWidget' })]
    })
  ]
};

const PENDING = 'func f() {\n\tw := &Widget{Name: "a", Size: 3, Color: "red"}\n}\n';
const DONE = 'func f() {\n\tw := newWidget("a", 3)\n\tw.Color = "red"\n}\n';

/**
 * Test suite: per-file run contract (read, transform, backup, write).
 */
describe('File Runner', () => {
  test('rewrites changed files and leaves the others alone', async () => {
    const store = createMemoryStore({ 'a.go': PENDING, 'b.go': DONE });
    const backup = createMemoryBackup();

    const summary = await rewriteFiles(['a.go', 'b.go', 'c.go'], options, { store, backup });

    expect(summary).toMatchObject({
      filesScanned: 3,
      filesChanged: 1,
      filesFailed: 1,
      totalRewrites: 1
    });
    expect(summary.files.map(({ path, status, written }) => ({ path, status, written }))).toEqual([
      { path: 'a.go', status: 'rewritten', written: true },
      { path: 'b.go', status: 'unchanged', written: false },
      { path: 'c.go', status: 'failed', written: false }
    ]);
    expect(summary.files[2].error).toEqual({
      kind: 'IOFailure',
      message: '[literal-rewrite] Cannot read "c.go".'
    });

    expect(store.files.get('a.go')).toBe(DONE);
    expect(store.writes).toEqual(['a.go']);
    expect(Array.from(backup.saved.entries())).toEqual([['a.go', PENDING]]);
  });

  test('computes everything and writes nothing in dry-run mode', async () => {
    const store = createMemoryStore({ 'a.go': PENDING });
    const backup = createMemoryBackup();

    const summary = await rewriteFiles(['a.go'], options, { store, backup, dryRun: true });

    expect(summary.files[0]).toMatchObject({ status: 'rewritten', count: 1, written: false });
    expect(store.writes).toEqual([]);
    expect(backup.saved.size).toBe(0);
  });

  test('does not write a file whose backup failed', async () => {
    const store = createMemoryStore({ 'a.go': PENDING, 'b.go': PENDING });
    const backup = createMemoryBackup(['a.go']);

    const summary = await rewriteFiles(['a.go', 'b.go'], options, { store, backup });

    expect(summary.files[0].error).toEqual({
      kind: 'BackupFailure',
      message: '[literal-rewrite] Cannot back up "a.go"; the file was not written.'
    });
    expect(store.files.get('a.go')).toBe(PENDING);
    expect(store.writes).toEqual(['b.go']);
  });

  test('wraps an unexpected backup error as a backup failure', async () => {
    const store = createMemoryStore({ 'a.go': PENDING });

    const summary = await rewriteFiles(['a.go'], options, {
      store,
      backup: {
        async save() {
          throw new Error('disk full');
        }
      }
    });

    expect(summary.files[0].error).toEqual({
      kind: 'BackupFailure',
      message: '[literal-rewrite] Cannot back up "a.go"; the file was not written. (disk full)'
    });
  });

  test('reports a failed write after the backup was taken', async () => {
    const store = createMemoryStore({ 'a.go': PENDING }, ['a.go']);
    const backup = createMemoryBackup();

    const summary = await rewriteFiles(['a.go'], options, { store, backup });

    expect(summary.filesFailed).toBe(1);
    expect(summary.files[0].error?.kind).toBe('IOFailure');
    expect(backup.saved.get('a.go')).toBe(PENDING);
  });

  test('keeps input order with several workers', async () => {
    const paths = ['a.go', 'b.go', 'c.go', 'd.go', 'e.go'];
    const store = createMemoryStore(Object.fromEntries(paths.map(path => [path, PENDING])));

    const summary = await rewriteFiles(paths, options, {
      store,
      backup: createMemoryBackup(),
      concurrency: 2
    });

    expect(summary.files.map(file => file.path)).toEqual(paths);
    expect(summary.totalRewrites).toBe(5);
  });

  test('renames call prefixes through the same runner', async () => {
    const store = createMemoryStore({ 'a.go': 'log.info("a")\nlog.warn("b")\n' });

    const summary = await substituteFiles(
      ['a.go'],
      { from: 'log', to: 'logger' },
      { store, backup: createMemoryBackup() }
    );

    expect(summary.totalRewrites).toBe(2);
    expect(store.files.get('a.go')).toBe('logger.info("a")\nlogger.warn("b")\n');
  });

  test('reports a throwing transform for that file and continues', async () => {
    const store = createMemoryStore({ 'a.go': 'x', 'b.go': 'y' });

    const summary = await runFileTransform(
      ['a.go', 'b.go'],
      (source, path) => {
        if (path === 'a.go') throw new Error('boom');
        return { text: `${source}!`, changed: true, count: 1, diagnostics: [] };
      },
      { store, backup: createMemoryBackup() }
    );

    expect(summary).toMatchObject({ filesScanned: 2, filesChanged: 1, filesFailed: 1 });
    expect(summary.files[0].error).toEqual({
      kind: 'RewriteFailure',
      message: '[literal-rewrite] Cannot rewrite "a.go". (boom)'
    });
    expect(store.files.get('a.go')).toBe('x');
    expect(store.writes).toEqual(['b.go']);
  });

  test('reports a file whose rewriting does not converge', async () => {
    const nested = (depth: number): string =>
      depth === 0
        ? '&Widget{Name: "a", Size: 1}'
        : `&Widget{Name: "a", Size: 1, Child: ${nested(depth - 1)}}`;
    const deep = `func f() {\n\tw := ${nested(33)}\n}\n`;
    const store = createMemoryStore({ 'a.go': deep, 'b.go': PENDING });

    const summary = await rewriteFiles(['a.go', 'b.go'], options, {
      store,
      backup: createMemoryBackup()
    });

    expect(summary.files.map(({ path, status }) => ({ path, status }))).toEqual([
      { path: 'a.go', status: 'failed' },
      { path: 'b.go', status: 'rewritten' }
    ]);
    expect(summary.files[0].error).toEqual({
      kind: 'RewriteFailure',
      message: '[literal-rewrite] Rewriting did not converge after 32 rounds.'
    });
    expect(store.files.get('a.go')).toBe(deep);
    expect(store.files.get('b.go')).toBe(DONE);
  });

  test('passes the path to the transform', async () => {
    const store = createMemoryStore({ 'a.go': 'x' });
    const seen: string[] = [];

    await runFileTransform(
      ['a.go'],
      (source, path) => {
        seen.push(path);
        return { text: source, changed: false, count: 0, diagnostics: [] };
      },
      { store, backup: createMemoryBackup() }
    );

    expect(seen).toEqual(['a.go']);
  });
});
