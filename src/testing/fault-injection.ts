import path from 'node:path';

import type { ContentDigest, FileHasher } from '../application/ports/file-hasher.port';
import type { CopyOutcome, FileSystemEntry } from '../application/ports/file-system.port';
import { FS_ERROR_KIND, err } from '../domain/result';
import type { FsErrorKind, FsResult } from '../domain/result';
import { NodeFileHasher } from '../infrastructure/node-file-hasher';
import { NodeFileSystem } from '../infrastructure/node-file-system';

const denied = (targetPath: string, kind: FsErrorKind) =>
  err({ kind, path: targetPath, message: `injected ${kind}` });

/**
 * Node filesystem that fails chosen calls, for conditions root cannot provoke with chmod.
 */
export class FaultyFileSystem extends NodeFileSystem {
  private readonly unlistable = new Set<string>();
  private readonly undeletable = new Set<string>();
  private readonly uncopyable = new Set<string>();
  private readonly uncreatable = new Set<string>();

  public denyListing(targetPath: string): this {
    this.unlistable.add(path.resolve(targetPath));
    return this;
  }

  public denyRemoval(targetPath: string): this {
    this.undeletable.add(path.resolve(targetPath));
    return this;
  }

  /** Fail copies whose source is sourcePath. */
  public denyCopy(sourcePath: string): this {
    this.uncopyable.add(path.resolve(sourcePath));
    return this;
  }

  public denyCreate(targetPath: string): this {
    this.uncreatable.add(path.resolve(targetPath));
    return this;
  }

  public override async copyFile(
    sourcePath: string,
    destinationPath: string,
  ): Promise<FsResult<CopyOutcome>> {
    if (this.uncopyable.has(path.resolve(sourcePath))) {
      return denied(sourcePath, FS_ERROR_KIND.IO_FAILURE);
    }
    return super.copyFile(sourcePath, destinationPath);
  }

  public override async createDirectory(
    targetPath: string,
    options?: { recursive?: boolean },
  ): Promise<FsResult<void>> {
    if (this.uncreatable.has(path.resolve(targetPath))) {
      return denied(targetPath, FS_ERROR_KIND.PERMISSION_DENIED);
    }
    return super.createDirectory(targetPath, options);
  }

  public override async listEntries(targetPath: string): Promise<FsResult<FileSystemEntry[]>> {
    if (this.unlistable.has(path.resolve(targetPath))) {
      return denied(targetPath, FS_ERROR_KIND.PERMISSION_DENIED);
    }
    return super.listEntries(targetPath);
  }

  public override async removeDirectory(targetPath: string): Promise<FsResult<void>> {
    if (this.undeletable.has(path.resolve(targetPath))) {
      return denied(targetPath, FS_ERROR_KIND.PERMISSION_DENIED);
    }
    return super.removeDirectory(targetPath);
  }
}

export class FaultyFileHasher implements FileHasher {
  private readonly delegate = new NodeFileHasher();
  private readonly unreadable = new Set<string>();

  public failOn(targetPath: string): this {
    this.unreadable.add(path.resolve(targetPath));
    return this;
  }

  public async hashFile(absolutePath: string): Promise<FsResult<ContentDigest>> {
    if (this.unreadable.has(path.resolve(absolutePath))) {
      return denied(absolutePath, FS_ERROR_KIND.HASH_FAILURE);
    }
    return this.delegate.hashFile(absolutePath);
  }
}
