// Entity metadata
export {
  formatTimestamp,
  getEntityMetadata,
  isSameEntityVersion,
  isValidEntityId,
  parseTimestamp,
  type EntityMetadata,
  type OperationKind,
  type SyncEntity,
} from './types/entity.js';

// Local storage contract
export {
  ZERO_CURSOR,
  compareCursor,
  type EntityStore,
  type LocalStore,
  type PendingOperation,
  type PendingOperationState,
  type PullCursor,
} from './types/storage.js';

// Version tokens
export {
  conditionMatches,
  decodeVersion,
  encodeVersion,
  formatETag,
  parseETagHeader,
  versionBytesEqual,
  type ETagCondition,
} from './version.js';

// Errors
export * from './errors/index.js';

// Logging
export {
  createLogger,
  formatLogLine,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type LoggerSetting,
} from './logger.js';
