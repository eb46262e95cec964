import path from 'node:path';

import type { FileHasher } from '../ports/file-hasher.port';
import type { FileSystemEntry, FileSystemPort } from '../ports/file-system.port';
import { MERGE_EVENT_KIND, ignoreEvents } from '../../domain/merge-event';
import type { MergeEventKind, MergeEventListener } from '../../domain/merge-event';
import { FS_ERROR_KIND } from '../../domain/result';
import type { FsError } from '../../domain/result';
import { createRunStatistics } from '../../domain/run-statistics';
import type { MergeReport, RunStatistics } from '../../domain/run-statistics';
import { NAME_KIND } from '../../domain/sibling-name';
import { getLogger } from '../../utils/get-logger';
import type { ServiceLogger } from '../../utils/get-logger';
import { NameConflictResolver } from './name-conflict-resolver';

export type MergeEngineConfig = {
  destinationRoot: string;
  sourceRoots: string[];
};

/**
 * Merges source trees into one destination tree.
 *
 * Files: copied when the destination is free, skipped when the destination
 * has the same digest, copied to a "_N" sibling otherwise. Directories: created
 * when free, otherwise the whole incoming directory goes to a "_N" sibling, so
 * same-named directories from different sources never interleave.
 *
 * Every failure is confined to the file or directory it happened on and
 * counted in the run's statistics.
 */
export class MergeEngine {
  private readonly nameResolver: NameConflictResolver;
  private readonly destinationRoot: string;
  private readonly sourceRoots: string[];

  public constructor(
    config: MergeEngineConfig,
    private readonly fileSystem: FileSystemPort,
    private readonly hasher: FileHasher,
    private readonly onEvent: MergeEventListener = ignoreEvents,
    private readonly logger: ServiceLogger = getLogger(),
  ) {
    this.destinationRoot = path.resolve(config.destinationRoot);
    this.sourceRoots = config.sourceRoots.map((sourceRoot) => path.resolve(sourceRoot));
    this.nameResolver = new NameConflictResolver(fileSystem);
  }

  public async run(): Promise<MergeReport> {
    const startedAt = new Date().toISOString();
    const statistics = createRunStatistics();

    const destination = await this.fileSystem.createDirectory(this.destinationRoot, {
      recursive: true,
    });

    if (!destination.ok) {
      this.recordError(statistics, destination.error, 'Cannot create destination root');
    } else {
      for (const [index, sourceRoot] of this.sourceRoots.entries()) {
        this.logger.info(`[${index + 1}/${this.sourceRoots.length}] Processing: ${sourceRoot}`);
        await this.mergeSourceRoot(sourceRoot, statistics);
      }
    }

    this.logger.debug(
      `Merge finished: sources=${this.sourceRoots.length}, filesCopied=${statistics.filesCopied}, errors=${statistics.errors}`,
    );

    return {
      destinationRoot: this.destinationRoot,
      sourceRoots: this.sourceRoots,
      statistics,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  }

  private async mergeSourceRoot(sourceRoot: string, statistics: RunStatistics): Promise<void> {
    const stats = await this.fileSystem.stat(sourceRoot);
    if (!stats.ok) {
      this.recordError(statistics, stats.error, 'Source not found');
      return;
    }
    if (stats.value.type !== 'directory') {
      this.recordError(
        statistics,
        { kind: FS_ERROR_KIND.IO_FAILURE, path: sourceRoot, message: 'not a directory' },
        'Source is not a directory',
      );
      return;
    }

    // The root's children land directly in the destination root
    await this.mergeChildren(sourceRoot, this.destinationRoot, statistics);
  }

  private async mergeChildren(
    sourceDirectory: string,
    destinationDirectory: string,
    statistics: RunStatistics,
  ): Promise<void> {
    const entries = await this.fileSystem.listEntries(sourceDirectory);
    if (!entries.ok) {
      this.recordError(statistics, entries.error, 'Cannot read folder');
      return;
    }

    for (const entry of entries.value) {
      await this.mergeEntry(entry, destinationDirectory, statistics);
    }
  }

  private async mergeEntry(
    entry: FileSystemEntry,
    destinationDirectory: string,
    statistics: RunStatistics,
  ): Promise<void> {
    if (path.resolve(entry.path) === this.destinationRoot) {
      this.logger.debug(`Skipping destination root found inside a source: path=${entry.path}`);
      return;
    }

    if (entry.type === 'file') {
      await this.mergeFile(entry.path, path.join(destinationDirectory, entry.name), statistics);
      return;
    }

    if (entry.type === 'directory') {
      await this.mergeDirectory(entry, destinationDirectory, statistics);
      return;
    }

    if (entry.type === 'symlink') {
      const target = await this.fileSystem.stat(entry.path);
      if (target.ok && target.value.type === 'file') {
        await this.mergeFile(entry.path, path.join(destinationDirectory, entry.name), statistics);
        return;
      }
    }

    this.logger.debug(`Skipping entry: path=${entry.path}, type=${entry.type}`);
  }

  private async mergeFile(
    sourceFile: string,
    destinationFile: string,
    statistics: RunStatistics,
  ): Promise<void> {
    if (!(await this.fileSystem.exists(destinationFile))) {
      if (await this.copy(sourceFile, destinationFile, statistics)) {
        statistics.filesCopied += 1;
        this.emit(
          MERGE_EVENT_KIND.FILE_COPIED,
          destinationFile,
          `COPY: ${sourceFile} -> ${destinationFile}`,
          false,
        );
      }
      return;
    }

    if (await this.areIdentical(sourceFile, destinationFile)) {
      statistics.filesSkipped += 1;
      this.emit(
        MERGE_EVENT_KIND.FILE_SKIPPED,
        destinationFile,
        `SKIP (identical): ${destinationFile}`,
        false,
      );
      return;
    }

    const renamedFile = await this.nameResolver.resolve(destinationFile, NAME_KIND.FILE);
    if (await this.copy(sourceFile, renamedFile, statistics)) {
      statistics.filesRenamed += 1;
      this.emit(
        MERGE_EVENT_KIND.FILE_RENAMED,
        renamedFile,
        `RENAME FILE: ${path.basename(destinationFile)} -> ${path.basename(renamedFile)}`,
        false,
      );
    }
  }

  private async mergeDirectory(
    entry: FileSystemEntry,
    destinationParent: string,
    statistics: RunStatistics,
  ): Promise<void> {
    const desired = path.join(destinationParent, entry.name);
    const target = await this.nameResolver.resolve(desired, NAME_KIND.DIRECTORY);

    const created = await this.fileSystem.createDirectory(target);
    if (!created.ok) {
      this.recordError(statistics, created.error, 'Cannot create folder');
      return;
    }

    if (target === desired) {
      statistics.directoriesCreated += 1;
      this.emit(MERGE_EVENT_KIND.DIR_CREATED, target, `FOLDER: ${target}`, false);
    } else {
      statistics.directoriesRenamed += 1;
      this.emit(
        MERGE_EVENT_KIND.DIR_RENAMED,
        target,
        `CONFLICT: Folder '${entry.name}' exists -> '${path.basename(target)}'`,
        true,
      );
    }

    await this.mergeChildren(entry.path, target, statistics);
  }

  /**
   * Identical only when both digests compute and match; anything unverifiable
   * counts as different so it gets copied under a new name.
   */
  private async areIdentical(first: string, second: string): Promise<boolean> {
    const firstDigest = await this.hasher.hashFile(first);
    if (!firstDigest.ok) {
      this.reportHashFailure(firstDigest.error);
      return false;
    }

    const secondDigest = await this.hasher.hashFile(second);
    if (!secondDigest.ok) {
      this.reportHashFailure(secondDigest.error);
      return false;
    }

    return firstDigest.value.value === secondDigest.value.value;
  }

  private async copy(
    sourceFile: string,
    destinationFile: string,
    statistics: RunStatistics,
  ): Promise<boolean> {
    const copied = await this.fileSystem.copyFile(sourceFile, destinationFile);
    if (!copied.ok) {
      this.recordError(statistics, copied.error, `Cannot copy file ${sourceFile}`);
      return false;
    }

    if (!copied.value.timestampsPreserved) {
      this.logger.debug(`Timestamps not preserved: path=${destinationFile}`);
    }
    return true;
  }

  private reportHashFailure(error: FsError): void {
    this.emit(
      MERGE_EVENT_KIND.HASH_FAILED,
      error.path,
      `Could not hash file ${error.path}: ${error.message}`,
      true,
      error,
    );
  }

  private recordError(statistics: RunStatistics, error: FsError, context: string): void {
    statistics.errors += 1;
    this.emit(
      MERGE_EVENT_KIND.ERROR,
      error.path,
      `ERROR: ${context}: ${error.path}: ${error.message}`,
      true,
      error,
    );
  }

  private emit(
    kind: MergeEventKind,
    eventPath: string,
    detail: string,
    visible: boolean,
    error?: FsError,
  ): void {
    this.onEvent({
      kind,
      path: eventPath,
      detail,
      visible,
      ...(error ? { errorKind: error.kind } : {}),
    });
  }
}
