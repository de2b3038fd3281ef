/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
  type ErrorScope,
} from './ApplicationError.js';

// Validation / configuration
export {
  ValidationError,
  UnsupportedContainerError,
  ConfigurationError,
} from './ApplicationError.js';

// File system
export {
  FileSystemError,
  DirectoryUnreadableError,
  InsufficientSpaceError,
} from './ApplicationError.js';

// System / process
export {
  DependencyError,
  MergeToolError,
  MergeTimeoutError,
  InvalidStateError,
} from './ApplicationError.js';
