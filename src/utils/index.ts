export { logger, resolveLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';
export {
  PhonebookError, ValidationError, EntryNotFoundError, DuplicateEntryError,
  StoreError, ConfigError, describeError, hasErrorCode,
} from './errors.js';
export type { PhonebookErrorCode } from './errors.js';
export { ok, err } from './result.js';
export type { Result } from './result.js';
