import type { Logger } from 'pino';

import { MERGE_EVENT_KIND } from '../domain/merge-event';
import type { MergeEvent, MergeEventListener } from '../domain/merge-event';

export type EventLogger = Pick<Logger, 'error' | 'warn' | 'info' | 'debug'>;

/**
 * Route core events to the logger: errors at error, hash failures at warn,
 * visible events at info and the rest at debug (log file only by default).
 */
export const createLogEventReporter = (logger: EventLogger): MergeEventListener => {
  return (event: MergeEvent) => {
    const context = {
      kind: event.kind,
      path: event.path,
      ...(event.errorKind ? { errorKind: event.errorKind } : {}),
    };

    if (event.kind === MERGE_EVENT_KIND.ERROR) {
      logger.error(context, event.detail);
      return;
    }
    if (event.kind === MERGE_EVENT_KIND.HASH_FAILED) {
      logger.warn(context, event.detail);
      return;
    }
    if (event.visible) {
      logger.info(context, event.detail);
      return;
    }
    logger.debug(context, event.detail);
  };
};
