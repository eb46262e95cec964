import { FS_ERROR_KIND, err, ok } from '../domain/result';
import type { FsError, FsErrorKind, FsResult } from '../domain/result';

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export const classifyError = (error: unknown): FsErrorKind => {
  switch (errorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return FS_ERROR_KIND.NOT_FOUND;
    case 'EACCES':
    case 'EPERM':
      return FS_ERROR_KIND.PERMISSION_DENIED;
    default:
      return FS_ERROR_KIND.IO_FAILURE;
  }
};

export const isAlreadyExistsError = (error: unknown) => errorCode(error) === 'EEXIST';

export const toFsError = (targetPath: string, error: unknown, kind?: FsErrorKind): FsError => ({
  kind: kind ?? classifyError(error),
  path: targetPath,
  message: error instanceof Error ? error.message : String(error),
});

/**
 * Run a filesystem call and capture its failure as a classified FsError.
 */
export const toFsResult = async <T>(
  targetPath: string,
  operation: () => Promise<T>,
  kind?: FsErrorKind,
): Promise<FsResult<T>> => {
  try {
    return ok(await operation());
  } catch (error) {
    return err(toFsError(targetPath, error, kind));
  }
};
