// Centralized error handling utilities

export interface AppErrorOptions {
  /** HTTP status returned by the upstream service, when there was one */
  status?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public status?: number;
  public details?: Record<string, unknown>;

  constructor(
    message: string,
    public code: string,
    options: AppErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.status = options.status;
    this.details = options.details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', { details });
    this.name = 'ValidationError';
  }
}

/**
 * The response body could not be turned into the expected result shape.
 */
export class DecodeError extends AppError {
  constructor(service: string, message: string, details?: Record<string, unknown>) {
    super(`${service} decode error: ${message}`, 'DECODE_ERROR', { details });
    this.name = 'DecodeError';
  }
}

/**
 * The request never produced a response (DNS, refused connection, reset socket).
 */
export class TransportError extends AppError {
  constructor(service: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${service} request to ${url} failed: ${reason}`, 'TRANSPORT_ERROR', {
      details: { url },
      cause,
    });
    this.name = 'TransportError';
  }
}

export class ExternalApiError extends AppError {
  constructor(service: string, message: string, status: number = 502) {
    super(`${service} API error: ${message}`, 'EXTERNAL_API_ERROR', { status });
    this.name = 'ExternalApiError';
  }
}

export class RateLimitError extends AppError {
  constructor(service: string, retryAfter?: number) {
    super(`Rate limit exceeded for ${service}`, 'RATE_LIMIT_ERROR', {
      status: 503,
      details: retryAfter !== undefined ? { retryAfter } : undefined,
    });
    this.name = 'RateLimitError';
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError(error.message, 'INTERNAL_ERROR', { cause: error });
  }
  return new AppError('An unexpected error occurred', 'INTERNAL_ERROR');
}
