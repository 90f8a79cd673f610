/**
 * tablesync error system
 *
 * @example
 * ```typescript
 * import { TableSyncError } from '@tablesync/core';
 *
 * try {
 *   await engine.synchronize();
 * } catch (error) {
 *   if (TableSyncError.isCategory(error, 'configuration')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConfigurationError,
  LocalStorageError,
  OperationsQueueError,
  SyncCancelledError,
  TableSyncError,
  TransportError,
  ensureTableSyncError,
  toError,
  type ConfigurationIssue,
  type SerializedTableSyncError,
  type TableSyncErrorOptions,
} from './tablesync-error.js';
