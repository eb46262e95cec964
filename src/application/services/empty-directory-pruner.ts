import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import { MERGE_EVENT_KIND, ignoreEvents } from '../../domain/merge-event';
import type { MergeEventListener } from '../../domain/merge-event';
import { FS_ERROR_KIND } from '../../domain/result';
import type { FsError } from '../../domain/result';
import { createPruneStatistics } from '../../domain/run-statistics';
import type { PruneReport, PruneStatistics } from '../../domain/run-statistics';
import { getLogger } from '../../utils/get-logger';
import type { ServiceLogger } from '../../utils/get-logger';

export type PruneOptions = {
  /** Also remove the root itself when nothing below it is a file. */
  includeRoot?: boolean;
};

type DirectoryNode = {
  path: string;
  depth: number;
  occupied: boolean;
};

export class EmptyDirectoryPruner {
  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly onEvent: MergeEventListener = ignoreEvents,
    private readonly logger: ServiceLogger = getLogger(),
  ) { }

  public async prune(root: string, options: PruneOptions = {}): Promise<PruneReport> {
    const resolvedRoot = path.resolve(root);
    const statistics = createPruneStatistics();
    const removed: string[] = [];

    const stats = await this.fileSystem.stat(resolvedRoot);
    if (!stats.ok) {
      this.recordError(statistics, stats.error, 'Path does not exist');
      return { root: resolvedRoot, statistics, removed };
    }
    if (stats.value.type !== 'directory') {
      this.recordError(
        statistics,
        { kind: FS_ERROR_KIND.IO_FAILURE, path: resolvedRoot, message: 'not a directory' },
        'Cannot prune',
      );
      return { root: resolvedRoot, statistics, removed };
    }

    const nodes: DirectoryNode[] = [];
    await this.inspect(resolvedRoot, 0, nodes, statistics);

    // Emptiness depends only on files, so removing a child never changes a parent's verdict
    const candidates = nodes
      .filter((node) => !node.occupied && (options.includeRoot || node.depth > 0))
      .sort((left, right) => right.depth - left.depth);

    for (const candidate of candidates) {
      const result = await this.fileSystem.removeDirectory(candidate.path);
      if (!result.ok) {
        this.recordError(statistics, result.error, 'Cannot delete');
        continue;
      }
      statistics.directoriesRemoved += 1;
      removed.push(candidate.path);
      this.onEvent({
        kind: MERGE_EVENT_KIND.DIR_REMOVED,
        path: candidate.path,
        detail: `DELETING EMPTY: ${candidate.path}`,
        visible: true,
      });
    }

    this.logger.debug(
      `Prune finished: root=${resolvedRoot}, scanned=${nodes.length}, removed=${statistics.directoriesRemoved}, errors=${statistics.errors}`,
    );

    return { root: resolvedRoot, statistics, removed };
  }

  public async pruneAll(roots: string[], options: PruneOptions = {}): Promise<PruneReport[]> {
    const reports: PruneReport[] = [];
    for (const [index, root] of roots.entries()) {
      this.logger.info(`[${index + 1}/${roots.length}] Cleaning: ${root}`);
      reports.push(await this.prune(root, options));
    }
    return reports;
  }

  /**
   * Records every directory below (and including) directoryPath with whether
   * its subtree holds anything besides directories. Unreadable directories
   * count as occupied.
   */
  private async inspect(
    directoryPath: string,
    depth: number,
    nodes: DirectoryNode[],
    statistics: PruneStatistics,
  ): Promise<boolean> {
    const entries = await this.fileSystem.listEntries(directoryPath);
    if (!entries.ok) {
      this.recordError(statistics, entries.error, 'Cannot read folder');
      nodes.push({ path: directoryPath, depth, occupied: true });
      return true;
    }

    let occupied = false;
    for (const entry of entries.value) {
      if (entry.type === 'directory') {
        const childOccupied = await this.inspect(entry.path, depth + 1, nodes, statistics);
        occupied = occupied || childOccupied;
      } else {
        occupied = true;
      }
    }

    nodes.push({ path: directoryPath, depth, occupied });
    return occupied;
  }

  private recordError(statistics: PruneStatistics, error: FsError, context: string): void {
    statistics.errors += 1;
    this.onEvent({
      kind: MERGE_EVENT_KIND.ERROR,
      path: error.path,
      detail: `ERROR: ${context}: ${error.path}: ${error.message}`,
      visible: true,
      errorKind: error.kind,
    });
  }
}

export const sumPruneStatistics = (reports: PruneReport[]): PruneStatistics =>
  reports.reduce(
    (total, report) => ({
      directoriesRemoved: total.directoriesRemoved + report.statistics.directoriesRemoved,
      errors: total.errors + report.statistics.errors,
    }),
    createPruneStatistics(),
  );
