export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  abstract readonly severity: ErrorSeverity;
  abstract readonly userMessage: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Remote inference endpoint timed out, was unreachable, or answered with a non-2xx status */
export class RemoteUnavailableError extends AppError {
  readonly code = "REMOTE_UNAVAILABLE";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage =
    "🤖 The analysis model is unavailable right now. Results may be degraded.";

  constructor(
    message: string,
    public readonly subType: RemoteFailureSubType,
    public readonly endpoint: string,
    public readonly status?: number,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }

  /** Timeouts, network failures, 429 and 5xx may succeed on a second attempt */
  get retryable(): boolean {
    if (this.subType !== RemoteFailureSubType.HTTP_STATUS) {
      return true;
    }
    return this.status === 429 || (this.status !== undefined && this.status >= 500);
  }
}

/** Response arrived but could not be turned into the expected structure */
export class MalformedResponseError extends AppError {
  readonly code = "MALFORMED_RESPONSE";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage =
    "🤖 The analysis model returned an unreadable answer. Results may be degraded.";

  constructor(
    message: string,
    public readonly rawPreview: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** Vector length differs from the dimension the store was built with */
export class EmbeddingDimensionMismatchError extends AppError {
  readonly code = "EMBEDDING_DIMENSION_MISMATCH";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.CRITICAL;
  readonly userMessage =
    "🔧 Knowledge base embedding configuration mismatch. Contact administrator.";

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly collection: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Embedding dimension mismatch in collection "${collection}": expected ${expected}, got ${actual}`,
      context
    );
  }
}

/** Alert, command or document input rejected at the boundary */
export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;

  constructor(
    message: string,
    public readonly field: string,
    public readonly userMessage: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

/** Bad configuration, failed startup or a broken dependency */
export class SystemError extends AppError {
  readonly code = "SYSTEM_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.HIGH;
  readonly userMessage = "🔧 System error. Contact administrator.";

  constructor(
    message: string,
    public readonly subType: SystemErrorSubType,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** Vector store or rule table file could not be read or written */
export class FileSystemError extends AppError {
  readonly code = "FS_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage = "📁 Knowledge base storage error. Please try again later.";

  constructor(
    message: string,
    public readonly operation: FileOperation,
    public readonly path?: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** Who has to act on the error */
export enum ErrorCategory {
  USER = "user",
  SYSTEM = "system",
  EXTERNAL = "external",
}

/** LOW and MEDIUM leave the bot usable; HIGH and CRITICAL need an operator */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export enum RemoteFailureSubType {
  TIMEOUT = "timeout",
  NETWORK = "network",
  HTTP_STATUS = "http_status",
}

export enum SystemErrorSubType {
  CONFIG = "config",
  STARTUP = "startup",
  DEPENDENCY = "dependency",
}

export enum FileOperation {
  READ = "read",
  WRITE = "write",
  DELETE = "delete",
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isRemoteUnavailableError(
  error: unknown
): error is RemoteUnavailableError {
  return error instanceof RemoteUnavailableError;
}

export function isMalformedResponseError(
  error: unknown
): error is MalformedResponseError {
  return error instanceof MalformedResponseError;
}

/** Errors an analyzer or answerer recovers from by degrading */
export function isRecoverableInferenceError(
  error: unknown
): error is RemoteUnavailableError | MalformedResponseError {
  return isRemoteUnavailableError(error) || isMalformedResponseError(error);
}

export function isEmbeddingDimensionMismatchError(
  error: unknown
): error is EmbeddingDimensionMismatchError {
  return error instanceof EmbeddingDimensionMismatchError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isSystemError(error: unknown): error is SystemError {
  return error instanceof SystemError;
}

export function isFileSystemError(error: unknown): error is FileSystemError {
  return error instanceof FileSystemError;
}

/** Normalize a thrown value into an Error instance */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface HandledError {
  readonly userMessage: string;
  readonly shouldRetry: boolean;
}

export interface SimpleErrorHandler {
  handle(error: unknown): HandledError;
}

const GENERIC_FAILURE: HandledError = {
  userMessage: "⚠️ An error occurred. Please try again.",
  shouldRetry: true,
};

const UNKNOWN_FAILURE: HandledError = {
  userMessage: "❌ Unknown error. Contact administrator.",
  shouldRetry: false,
};

/** Turns anything a bot handler threw into the reply the user sees */
export class DefaultErrorHandler implements SimpleErrorHandler {
  handle(error: unknown): HandledError {
    if (!isAppError(error)) {
      return error instanceof Error ? GENERIC_FAILURE : UNKNOWN_FAILURE;
    }

    switch (error.severity) {
      case ErrorSeverity.LOW:
      case ErrorSeverity.MEDIUM:
        return { userMessage: error.userMessage, shouldRetry: true };
      case ErrorSeverity.HIGH:
      case ErrorSeverity.CRITICAL:
        return { userMessage: error.userMessage, shouldRetry: false };
    }
  }
}

export function createDefaultErrorHandler(): SimpleErrorHandler {
  return new DefaultErrorHandler();
}
