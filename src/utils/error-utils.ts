/**
 * Error taxonomy and handling utilities shared by every layer.
 *
 * Every failure that leaves the core is a `SnapshotPortalError`, which serializes to
 * `{ kind, message, retryable }` for the UI layer.
 */

import { getLogger } from './structured-logger.js';

export type ErrorKind =
  | 'ValidationError'
  | 'AuthError'
  | 'TransportError'
  | 'BackendUnavailable'
  | 'TimeoutError'
  | 'BackendError'
  | 'UnsupportedOperation'
  | 'NoBackendAvailable'
  | 'JobNotFound'
  | 'NotFound'
  | 'ConfigurationError'
  | 'InternalError';

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export class SnapshotPortalError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }

  toPayload(): ErrorPayload {
    return { kind: this.kind, message: this.message, retryable: this.retryable };
  }
}

/**
 * Path escape or unsupported path form. Raised before any backend is contacted.
 */
export class ValidationError extends SnapshotPortalError {
  constructor(
    message: string,
    public readonly requestedPath?: string
  ) {
    super('ValidationError', message, false);
  }
}

export class AuthError extends SnapshotPortalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AuthError', message, false, options);
  }
}

export class TransportError extends SnapshotPortalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TransportError', message, true, options);
  }
}

export class BackendUnavailableError extends SnapshotPortalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BackendUnavailable', message, true, options);
  }
}

export class TimeoutError extends SnapshotPortalError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super('TimeoutError', message, true);
  }
}

/**
 * The backend executed the request and reported a failure (RPC error, non-zero exit).
 */
export class BackendError extends SnapshotPortalError {
  public readonly code?: string | number;
  public readonly exitCode?: number | null;
  public readonly stderr?: string;

  constructor(
    message: string,
    details: { code?: string | number; exitCode?: number | null; stderr?: string } = {}
  ) {
    super('BackendError', message, false);
    this.code = details.code;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export class UnsupportedOperationError extends SnapshotPortalError {
  constructor(
    public readonly operation: string,
    public readonly backend: string
  ) {
    super('UnsupportedOperation', `Operation '${operation}' is not supported by the ${backend} backend`, false);
  }
}

export class NoBackendAvailableError extends SnapshotPortalError {
  constructor(
    message: string,
    public readonly attempts: ReadonlyArray<{ backend: string; error?: ErrorPayload }> = []
  ) {
    super('NoBackendAvailable', message, false);
  }
}

export class JobNotFoundError extends SnapshotPortalError {
  constructor(public readonly jobId: string) {
    super('JobNotFound', `Restore job not found: ${jobId}`, false);
  }
}

export class NotFoundError extends SnapshotPortalError {
  constructor(message: string) {
    super('NotFound', message, false);
  }
}

export class ConfigurationError extends SnapshotPortalError {
  constructor(
    message: string,
    public readonly configPath?: string,
    options?: { cause?: unknown }
  ) {
    super('ConfigurationError', message, false, options);
  }
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Convert any thrown value into the payload surfaced to the UI layer
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof SnapshotPortalError) {
    return error.toPayload();
  }
  return { kind: 'InternalError', message: getErrorMessage(error), retryable: false };
}

export function isRetryable(error: unknown): boolean {
  return error instanceof SnapshotPortalError && error.retryable;
}

/**
 * Log error with consistent format and context
 */
export function logError(
  component: string,
  operation: string,
  error: unknown,
  additionalContext?: Record<string, string | number | boolean | undefined>
): void {
  const errorType = error instanceof Error ? error.constructor.name : typeof error;
  const kind = error instanceof SnapshotPortalError ? error.kind : 'InternalError';

  getLogger(component).error(`${operation}: ${getErrorMessage(error)}`, error, {
    operation,
    error_type: errorType,
    error_code: kind,
    ...additionalContext,
  });
}
