import type { FsResult } from '../../domain/result';

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

export type FileSystemEntry = {
  name: string;
  path: string;
  type: EntryType;
};

export type FileStats = {
  /** Type of the entry a path resolves to; symlinks are followed. */
  type: Exclude<EntryType, 'symlink'>;
  modifiedAt: Date;
  sizeBytes: number;
};

export type CopyOutcome = {
  timestampsPreserved: boolean;
};

export interface FileSystemPort {
  /** True when anything (including a dangling symlink) occupies the path. */
  exists(path: string): Promise<boolean>;
  stat(path: string): Promise<FsResult<FileStats>>;
  listEntries(path: string): Promise<FsResult<FileSystemEntry[]>>;
  createDirectory(path: string, options?: { recursive?: boolean }): Promise<FsResult<void>>;
  /** Copy bytes and timestamps. Never overwrites an existing destination. */
  copyFile(sourcePath: string, destinationPath: string): Promise<FsResult<CopyOutcome>>;
  /** Remove an empty directory; fails on a non-empty one. */
  removeDirectory(path: string): Promise<FsResult<void>>;
  readTextFile(path: string): Promise<FsResult<string>>;
}
