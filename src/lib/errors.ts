export const ErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  IO_ERROR: 'IO_ERROR',
  CLASSIFICATION_FAILED: 'CLASSIFICATION_FAILED',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  DECRYPTION_FAILED: 'DECRYPTION_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error for every failure raised by tidyfs.
 * `context` carries the paths and values involved so log lines stay self-contained.
 */
export class TidyError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** A required file or directory does not exist. */
export class NotFoundError extends TidyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCodes.NOT_FOUND, context);
  }
}

/** Read, write, move or rename failed part way through. */
export class FileOperationError extends TidyError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, ErrorCodes.IO_ERROR, context, { cause });
  }
}

/** The classification model failed or produced an unusable label. */
export class ClassificationError extends TidyError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, ErrorCodes.CLASSIFICATION_FAILED, context, { cause });
  }
}

export class ConfigurationError extends TidyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCodes.INVALID_CONFIGURATION, context);
  }
}

export class DecryptionError extends TidyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCodes.DECRYPTION_FAILED, context);
  }
}

/**
 * Shape check for errors; those thrown by Node internals may belong to
 * another realm (Jest's VM context) where `instanceof Error` is false.
 */
export function isErrorLike(value: unknown): value is Error {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

export function toError(value: unknown): Error {
  return isErrorLike(value) ? value : new Error(String(value));
}

/** Node system error code (ENOENT, EXDEV, ...) if the value carries one. */
export function errnoCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}
