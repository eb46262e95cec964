import type { FsResult } from '../../domain/result';

export type ContentDigest = {
  algorithm: 'md5';
  value: string;
};

export interface FileHasher {
  hashFile(absolutePath: string): Promise<FsResult<ContentDigest>>;
}
