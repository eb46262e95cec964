import type { ValueOf } from '../types/value-of';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export const FS_ERROR_KIND = {
  NOT_FOUND: 'not-found',
  PERMISSION_DENIED: 'permission-denied',
  IO_FAILURE: 'io-failure',
  HASH_FAILURE: 'hash-failure',
} as const;

export type FsErrorKind = ValueOf<typeof FS_ERROR_KIND>;

export type FsError = {
  kind: FsErrorKind;
  path: string;
  message: string;
};

export type FsResult<T> = Result<T, FsError>;
