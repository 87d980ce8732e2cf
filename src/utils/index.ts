export { logger } from './logger.js';
export {
  ContactNotFoundError,
  StoreError,
  DuplicateGroupNotFoundError,
  MergeError,
  ConfigError,
  errorMessage,
  isErrnoCode,
} from './errors.js';
export { generateId, stableId } from './id.js';
