import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import type { ContentDigest, FileHasher } from '../application/ports/file-hasher.port';
import { DEFAULT_HASH_CHUNK_SIZE_BYTES } from '../domain/consolidation-config';
import { FS_ERROR_KIND } from '../domain/result';
import type { FsResult } from '../domain/result';
import { toFsResult } from './fs-result';

/**
 * MD5 over the file's bytes, read in fixed-size chunks. Used for equality only.
 */
export class NodeFileHasher implements FileHasher {
  public constructor(private readonly chunkSizeBytes = DEFAULT_HASH_CHUNK_SIZE_BYTES) { }

  public async hashFile(absolutePath: string): Promise<FsResult<ContentDigest>> {
    return toFsResult(
      absolutePath,
      () =>
        new Promise<ContentDigest>((resolve, reject) => {
          const hash = createHash('md5');
          const stream = createReadStream(absolutePath, { highWaterMark: this.chunkSizeBytes });

          stream.on('data', (chunk) => hash.update(chunk));
          stream.on('error', reject);
          stream.on('end', () => {
            resolve({ algorithm: 'md5', value: hash.digest('hex') });
          });
        }),
      FS_ERROR_KIND.HASH_FAILURE,
    );
  }
}
