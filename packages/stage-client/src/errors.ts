/**
 * Stage error classes
 *
 * Declared in core so the executor can tell them apart; re-exported here
 * for client consumers.
 */

export {
  StageError,
  StageUnavailableError,
  StageTimeoutError,
  StageResponseError,
  mapHttpStatus,
} from '@annotext/core';
