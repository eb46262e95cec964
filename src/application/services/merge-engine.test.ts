import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { FileHasher } from '../ports/file-hasher.port';
import type { FileSystemPort } from '../ports/file-system.port';
import type { MergeEvent } from '../../domain/merge-event';
import { NodeFileHasher } from '../../infrastructure/node-file-hasher';
import { NodeFileSystem } from '../../infrastructure/node-file-system';
import { FaultyFileHasher, FaultyFileSystem } from '../../testing/fault-injection';
import { makeWorkspace, readTree, removeWorkspace, writeTree } from '../../testing/temp-tree';
import { MergeEngine } from './merge-engine';

describe('MergeEngine', () => {
  let workspace: string;
  let destination: string;
  let events: MergeEvent[];

  beforeEach(async () => {
    workspace = await makeWorkspace('merge');
    destination = path.join(workspace, 'master');
    events = [];
  });

  afterEach(async () => {
    await removeWorkspace(workspace);
  });

  const source = (name: string) => path.join(workspace, name);

  const merge = (
    sourceRoots: string[],
    fileSystem: FileSystemPort = new NodeFileSystem(),
    hasher: FileHasher = new NodeFileHasher(),
  ) =>
    new MergeEngine({ destinationRoot: destination, sourceRoots }, fileSystem, hasher, (event) =>
      events.push(event),
    ).run();

  it('copies the children of every source root into the destination root', async () => {
    await writeTree(source('a'), { 'notes.txt': 'n', 'Docs/plan.md': 'p', 'Docs/Old/': '' });

    const report = await merge([source('a')]);

    expect(await readTree(destination)).toEqual({
      'notes.txt': 'n',
      'Docs/plan.md': 'p',
      'Docs/Old/': '',
    });
    expect(report.statistics).toEqual({
      directoriesCreated: 2,
      directoriesRenamed: 0,
      filesCopied: 2,
      filesRenamed: 0,
      filesSkipped: 0,
      errors: 0,
    });
    expect(report.destinationRoot).toBe(destination);
    expect(report.sourceRoots).toEqual([source('a')]);
  });

  it('skips every file on a second run over the same flat source', async () => {
    await writeTree(source('a'), { 'one.txt': '1', 'two.txt': '2' });

    await merge([source('a')]);
    const second = await merge([source('a')]);

    expect(second.statistics).toEqual({
      directoriesCreated: 0,
      directoriesRenamed: 0,
      filesCopied: 0,
      filesRenamed: 0,
      filesSkipped: 2,
      errors: 0,
    });
    expect(await readTree(destination)).toEqual({ 'one.txt': '1', 'two.txt': '2' });
  });

  it('moves nested folders aside on a second run while skipping top-level files', async () => {
    await writeTree(source('a'), { 'top.txt': 't', 'D/inner.txt': 'i' });

    await merge([source('a')]);
    const second = await merge([source('a')]);

    expect(second.statistics).toEqual({
      directoriesCreated: 0,
      directoriesRenamed: 1,
      filesCopied: 1,
      filesRenamed: 0,
      filesSkipped: 1,
      errors: 0,
    });
    expect(await readTree(destination)).toEqual({
      'top.txt': 't',
      'D/inner.txt': 'i',
      'D_2/inner.txt': 'i',
    });
  });

  it('skips a byte-identical file at the same destination path', async () => {
    await writeTree(source('a'), { 'same.txt': 'shared bytes' });
    await writeTree(source('b'), { 'same.txt': 'shared bytes', 'copy.txt': 'shared bytes' });

    const report = await merge([source('a'), source('b')]);

    expect(report.statistics.filesCopied).toBe(2);
    expect(report.statistics.filesSkipped).toBe(1);
    expect(report.statistics.filesRenamed).toBe(0);
    expect(await readTree(destination)).toEqual({
      'same.txt': 'shared bytes',
      'copy.txt': 'shared bytes',
    });
  });

  it('keeps both versions when content differs', async () => {
    await writeTree(source('a'), { 'doc.txt': 'first' });
    await writeTree(source('b'), { 'doc.txt': 'second' });
    await writeTree(source('c'), { 'doc.txt': 'third' });

    const report = await merge([source('a'), source('b'), source('c')]);

    expect(await readTree(destination)).toEqual({
      'doc.txt': 'first',
      'doc_2.txt': 'second',
      'doc_3.txt': 'third',
    });
    expect(report.statistics.filesCopied).toBe(1);
    expect(report.statistics.filesRenamed).toBe(2);
    expect(events.filter((event) => event.kind === 'file-renamed').map((event) => event.detail)).toEqual([
      'RENAME FILE: doc.txt -> doc_2.txt',
      'RENAME FILE: doc.txt -> doc_3.txt',
    ]);
  });

  it('moves a colliding directory aside wholesale instead of interleaving', async () => {
    await writeTree(source('a'), { 'Photos/beach.jpg': 'sand' });
    await writeTree(source('b'), { 'Photos/snow.jpg': 'ice', 'Photos/beach.jpg': 'sand' });

    const report = await merge([source('a'), source('b')]);

    expect(await readTree(destination)).toEqual({
      'Photos/beach.jpg': 'sand',
      'Photos_2/snow.jpg': 'ice',
      'Photos_2/beach.jpg': 'sand',
    });
    expect(report.statistics.directoriesCreated).toBe(1);
    expect(report.statistics.directoriesRenamed).toBe(1);
    expect(report.statistics.filesCopied).toBe(3);
    expect(events).toContainEqual({
      kind: 'dir-renamed',
      path: path.join(destination, 'Photos_2'),
      detail: "CONFLICT: Folder 'Photos' exists -> 'Photos_2'",
      visible: true,
    });
  });

  it('isolates an unreadable directory from its siblings', async () => {
    await writeTree(source('a'), {
      'one/x.txt': 'x',
      'two/y.txt': 'y',
      'three/z.txt': 'z',
    });
    const fileSystem = new FaultyFileSystem().denyListing(path.join(source('a'), 'two'));

    const report = await merge([source('a')], fileSystem);

    expect(await readTree(destination)).toEqual({
      'one/x.txt': 'x',
      'two/': '',
      'three/z.txt': 'z',
    });
    expect(report.statistics.errors).toBe(1);
    expect(report.statistics.filesCopied).toBe(2);
    expect(events.filter((event) => event.kind === 'error')).toEqual([
      expect.objectContaining({
        path: path.join(source('a'), 'two'),
        errorKind: 'permission-denied',
        visible: true,
      }),
    ]);
  });

  it('counts a failed copy and keeps copying its siblings', async () => {
    await writeTree(source('a'), { 'bad.txt': 'b', 'good.txt': 'g', 'D/inner.txt': 'i' });
    const badFile = path.join(source('a'), 'bad.txt');
    const fileSystem = new FaultyFileSystem().denyCopy(badFile);

    const report = await merge([source('a')], fileSystem);

    expect(report.statistics).toEqual({
      directoriesCreated: 1,
      directoriesRenamed: 0,
      filesCopied: 2,
      filesRenamed: 0,
      filesSkipped: 0,
      errors: 1,
    });
    expect(await readTree(destination)).toEqual({ 'good.txt': 'g', 'D/inner.txt': 'i' });
    expect(events.filter((event) => event.kind === 'error')).toEqual([
      {
        kind: 'error',
        path: badFile,
        detail: `ERROR: Cannot copy file ${badFile}: ${badFile}: injected io-failure`,
        visible: true,
        errorKind: 'io-failure',
      },
    ]);
  });

  it('skips the contents of a folder it could not create', async () => {
    await writeTree(source('a'), {
      'top.txt': 't',
      'Keep/x.txt': 'x',
      'Blocked/y.txt': 'y',
      'Blocked/Sub/z.txt': 'z',
    });
    const fileSystem = new FaultyFileSystem().denyCreate(path.join(destination, 'Blocked'));

    const report = await merge([source('a')], fileSystem);

    expect(report.statistics).toEqual({
      directoriesCreated: 1,
      directoriesRenamed: 0,
      filesCopied: 2,
      filesRenamed: 0,
      filesSkipped: 0,
      errors: 1,
    });
    expect(await readTree(destination)).toEqual({ 'top.txt': 't', 'Keep/x.txt': 'x' });
    expect(events.filter((event) => event.kind === 'error')).toEqual([
      expect.objectContaining({
        path: path.join(destination, 'Blocked'),
        errorKind: 'permission-denied',
      }),
    ]);
  });

  it('writes progress lines to the logger it is given', async () => {
    await writeTree(source('a'), { 'a.txt': 'a' });
    const logger = { info: vi.fn(), debug: vi.fn() };

    await new MergeEngine(
      { destinationRoot: destination, sourceRoots: [source('a'), source('missing')] },
      new NodeFileSystem(),
      new NodeFileHasher(),
      (event) => events.push(event),
      logger,
    ).run();

    expect(logger.info.mock.calls).toEqual([
      [`[1/2] Processing: ${source('a')}`],
      [`[2/2] Processing: ${source('missing')}`],
    ]);
    expect(logger.debug).toHaveBeenCalledWith('Merge finished: sources=2, filesCopied=1, errors=1');
  });

  it('counts a missing source root and merges the rest', async () => {
    await writeTree(source('b'), { 'kept.txt': 'k' });

    const report = await merge([source('missing'), source('b')]);

    expect(report.statistics.errors).toBe(1);
    expect(report.statistics.filesCopied).toBe(1);
    expect(events[0]).toEqual(
      expect.objectContaining({ kind: 'error', path: source('missing'), errorKind: 'not-found' }),
    );
    expect(await readTree(destination)).toEqual({ 'kept.txt': 'k' });
  });

  it('renames instead of skipping when a digest cannot be computed', async () => {
    await writeTree(source('a'), { 'photo.jpg': 'same' });
    await writeTree(source('b'), { 'photo.jpg': 'same' });
    const hasher = new FaultyFileHasher().failOn(path.join(destination, 'photo.jpg'));

    const report = await merge([source('a'), source('b')], new NodeFileSystem(), hasher);

    expect(report.statistics).toEqual({
      directoriesCreated: 0,
      directoriesRenamed: 0,
      filesCopied: 1,
      filesRenamed: 1,
      filesSkipped: 0,
      errors: 0,
    });
    expect(await readTree(destination)).toEqual({ 'photo.jpg': 'same', 'photo_2.jpg': 'same' });
    expect(events.map((event) => event.kind)).toEqual(['file-copied', 'hash-failed', 'file-renamed']);
  });

  it('does not lose a file whose name is taken by a directory', async () => {
    await writeTree(source('a'), { 'report/inner.txt': 'i' });
    await writeTree(source('b'), { report: 'flat file' });

    const report = await merge([source('a'), source('b')]);

    expect(await readTree(destination)).toEqual({
      'report/inner.txt': 'i',
      report_2: 'flat file',
    });
    expect(report.statistics.filesRenamed).toBe(1);
    expect(report.statistics.errors).toBe(0);
  });

  it('does not merge a destination nested in a source into itself', async () => {
    destination = path.join(source('a'), 'master');
    await writeTree(source('a'), { 'a.txt': 'a' });

    const report = await merge([source('a')]);

    expect(await readTree(destination)).toEqual({ 'a.txt': 'a' });
    expect(report.statistics.directoriesCreated).toBe(0);
    expect(report.statistics.filesCopied).toBe(1);
  });
});
