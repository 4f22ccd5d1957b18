// src/utils/errors.ts

export class KarmaError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends KarmaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// API errors
export class ApiError extends KarmaError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiClientError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends KarmaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class OperationCancelledError extends KarmaError {
  constructor(message: string = 'Operation cancelled', details?: Record<string, unknown>) {
    super(message, 'OPERATION_CANCELLED', details);
  }
}

export class ValidationError extends KarmaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

export class EntityNotFoundError extends KarmaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ENTITY_NOT_FOUND', details);
  }
}

/**
 * One-line description of an error for the command line.
 */
export function summarizeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
