import type { ValueOf } from '../types/value-of';
import type { FsErrorKind } from './result';

export const MERGE_EVENT_KIND = {
  FILE_COPIED: 'file-copied',
  FILE_SKIPPED: 'file-skipped',
  FILE_RENAMED: 'file-renamed',
  DIR_CREATED: 'dir-created',
  DIR_RENAMED: 'dir-renamed',
  DIR_REMOVED: 'dir-removed',
  HASH_FAILED: 'hash-failed',
  ERROR: 'error',
} as const;

export type MergeEventKind = ValueOf<typeof MERGE_EVENT_KIND>;

export type MergeEvent = {
  kind: MergeEventKind;
  path: string;
  detail: string;
  /** Whether the event should reach interactive output, not only the log file. */
  visible: boolean;
  errorKind?: FsErrorKind;
};

export type MergeEventListener = (event: MergeEvent) => void;

export const ignoreEvents: MergeEventListener = () => undefined;
