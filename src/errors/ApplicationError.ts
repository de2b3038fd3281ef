/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Scope hints (recover per pair, or abort the whole batch)
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 */
export enum ErrorCode {
  // Informational (never thrown, surfaced in match results)
  PATTERN_MISMATCH = 'PatternMismatch',
  COLLISION_DETECTED = 'CollisionDetected',

  // Validation
  VALIDATION_INPUT_INVALID = 'ValidationInvalid',
  UNSUPPORTED_CONTAINER = 'UnsupportedContainer',

  // Resources
  DEPENDENCY_MISSING = 'DependencyMissing',
  INSUFFICIENT_SPACE = 'InsufficientSpace',

  // Merge tool
  MERGE_TOOL_FAILURE = 'MergeToolFailure',
  MERGE_TIMEOUT = 'MergeTimeout',

  // File system
  FILE_SYSTEM_ERROR = 'FileSystemError',
  DIRECTORY_UNREADABLE = 'DirectoryUnreadable',

  // Configuration / programmer errors
  CONFIG_INVALID = 'ConfigInvalid',
  INVALID_STATE = 'InvalidState',
}

/**
 * 'pair'  - recovered locally, the batch moves on to the next pair
 * 'batch' - precondition for the whole run, surfaced immediately
 */
export type ErrorScope = 'pair' | 'batch';

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'backupOriginals', 'commit') */
  operation?: string;

  /** Files involved in the failed operation */
  paths?: string[];

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

interface ApplicationErrorOptions {
  scope?: ErrorScope;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;

  public readonly scope: ErrorScope;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, options: ApplicationErrorOptions = {}) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.scope = options.scope ?? 'pair';
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  get isFatal(): boolean {
    return this.scope === 'batch';
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      scope: this.scope,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, {
      scope: 'pair',
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class UnsupportedContainerError extends ApplicationError {
  constructor(
    public readonly videoPath: string,
    public readonly supported: string[],
    context?: ErrorContext
  ) {
    super(
      `Cannot merge into '${videoPath}': supported containers are ${supported.map(ext => `.${ext}`).join(', ')}`,
      ErrorCode.UNSUPPORTED_CONTAINER,
      { scope: 'pair', context: { ...context, paths: [videoPath] } }
    );
  }
}

export class ConfigurationError extends ApplicationError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { scope: 'batch', context: { ...context, metadata: { ...context?.metadata, configKey } } }
    );
  }
}

// ============================================
// FILE SYSTEM ERRORS
// ============================================

export class FileSystemError extends ApplicationError {
  constructor(
    message: string,
    public readonly path: string,
    context?: ErrorContext,
    cause?: Error,
    code: ErrorCode = ErrorCode.FILE_SYSTEM_ERROR,
    scope: ErrorScope = 'pair'
  ) {
    super(message, code, {
      scope,
      context: { ...context, paths: context?.paths ?? [path] },
      ...(cause && { cause }),
    });
  }
}

export class DirectoryUnreadableError extends FileSystemError {
  constructor(path: string, cause?: Error) {
    super(
      `Cannot read directory: ${path}${cause ? ` (${cause.message})` : ''}`,
      path,
      { operation: 'scanDirectory' },
      cause,
      ErrorCode.DIRECTORY_UNREADABLE,
      'batch'
    );
  }
}

export class InsufficientSpaceError extends ApplicationError {
  constructor(
    public readonly path: string,
    public readonly requiredBytes: number,
    public readonly freeBytes: number,
    context?: ErrorContext
  ) {
    super(
      `Insufficient disk space on volume of ${path}: need ${requiredBytes} bytes, ${freeBytes} available`,
      ErrorCode.INSUFFICIENT_SPACE,
      {
        scope: 'pair',
        context: {
          ...context,
          paths: context?.paths ?? [path],
          metadata: { ...context?.metadata, requiredBytes, freeBytes },
        },
      }
    );
  }
}

// ============================================
// SYSTEM / PROCESS ERRORS
// ============================================

export class DependencyError extends ApplicationError {
  constructor(
    public readonly dependency: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Missing or invalid dependency: ${dependency}`,
      ErrorCode.DEPENDENCY_MISSING,
      { scope: 'batch', context: { ...context, metadata: { ...context?.metadata, dependency } } }
    );
  }
}

export class MergeToolError extends ApplicationError {
  constructor(
    public readonly exitCode: number | null,
    public readonly stderr: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Merge tool failed with exit code ${exitCode ?? 'unknown'}: ${stderr.trim() || 'no diagnostic output'}`,
      ErrorCode.MERGE_TOOL_FAILURE,
      {
        scope: 'pair',
        context: { ...context, metadata: { ...context?.metadata, exitCode } },
        ...(cause && { cause }),
      }
    );
  }
}

export class MergeTimeoutError extends ApplicationError {
  constructor(
    public readonly timeoutMs: number,
    public readonly stderr: string,
    context?: ErrorContext
  ) {
    super(
      `Merge tool timed out after ${Math.round(timeoutMs / 1000)}s`,
      ErrorCode.MERGE_TIMEOUT,
      { scope: 'pair', context: { ...context, durationMs: timeoutMs } }
    );
  }
}

export class InvalidStateError extends ApplicationError {
  constructor(
    public readonly expectedState: string,
    public readonly actualState: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid state: expected '${expectedState}', got '${actualState}'`,
      ErrorCode.INVALID_STATE,
      { scope: 'batch', context: { ...context, metadata: { ...context?.metadata, expectedState, actualState } } }
    );
  }
}
