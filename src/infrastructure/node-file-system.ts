import { constants, promises as fs } from 'node:fs';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';

import type {
  CopyOutcome,
  FileStats,
  FileSystemEntry,
  FileSystemPort,
} from '../application/ports/file-system.port';
import { err, ok } from '../domain/result';
import type { FsResult } from '../domain/result';
import { isAlreadyExistsError, toFsError, toFsResult } from './fs-result';

const mapEntryType = (entry: Dirent): FileSystemEntry['type'] => {
  if (entry.isFile()) {
    return 'file';
  }
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isSymbolicLink()) {
    return 'symlink';
  }
  return 'other';
};

const mapStatsType = (stats: Stats): FileStats['type'] => {
  if (stats.isFile()) {
    return 'file';
  }
  if (stats.isDirectory()) {
    return 'directory';
  }
  return 'other';
};

export class NodeFileSystem implements FileSystemPort {
  public async exists(targetPath: string): Promise<boolean> {
    try {
      await fs.lstat(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  public async stat(targetPath: string): Promise<FsResult<FileStats>> {
    return toFsResult(targetPath, async () => {
      const stats = await fs.stat(targetPath);
      return {
        type: mapStatsType(stats),
        modifiedAt: stats.mtime,
        sizeBytes: stats.size,
      };
    });
  }

  public async listEntries(targetPath: string): Promise<FsResult<FileSystemEntry[]>> {
    return toFsResult(targetPath, async () => {
      const entries = await fs.readdir(targetPath, { withFileTypes: true });
      return entries.map((entry) => ({
        name: entry.name,
        path: path.join(targetPath, entry.name),
        type: mapEntryType(entry),
      }));
    });
  }

  public async createDirectory(
    targetPath: string,
    options: { recursive?: boolean } = {},
  ): Promise<FsResult<void>> {
    return toFsResult(targetPath, async () => {
      await fs.mkdir(targetPath, { recursive: options.recursive ?? false });
    });
  }

  public async copyFile(
    sourcePath: string,
    destinationPath: string,
  ): Promise<FsResult<CopyOutcome>> {
    try {
      await fs.copyFile(sourcePath, destinationPath, constants.COPYFILE_EXCL);
    } catch (error) {
      const failure = toFsError(sourcePath, error);
      if (isAlreadyExistsError(error)) {
        return err({ ...failure, path: destinationPath });
      }

      // Drop whatever part of the destination got written
      const cleanup = await toFsResult(destinationPath, () =>
        fs.rm(destinationPath, { force: true }),
      );
      return err(
        cleanup.ok
          ? failure
          : { ...failure, message: `${failure.message} (partial copy left at ${destinationPath})` },
      );
    }

    const preserved = await toFsResult(destinationPath, async () => {
      const stats = await fs.stat(sourcePath);
      await fs.utimes(destinationPath, stats.atime, stats.mtime);
    });
    return ok({ timestampsPreserved: preserved.ok });
  }

  public async removeDirectory(targetPath: string): Promise<FsResult<void>> {
    return toFsResult(targetPath, () => fs.rmdir(targetPath));
  }

  public async readTextFile(targetPath: string): Promise<FsResult<string>> {
    return toFsResult(targetPath, () => fs.readFile(targetPath, 'utf8'));
  }
}
