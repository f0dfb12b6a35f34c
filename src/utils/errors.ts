// src/utils/errors.ts

export class WatchError extends Error {
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

export class ConfigError extends WatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// Checkpoint errors
export class CorruptStateError extends WatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CORRUPT_STATE', details);
  }
}

export class PersistenceError extends WatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSISTENCE_FAILURE', details);
  }
}

// Collaborator errors
export class SourceFetchError extends WatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_FETCH_FAILURE', details);
  }
}

export class SummarizeError extends WatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SUMMARIZE_FAILURE', details);
  }
}

export class DeliveryError extends WatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DELIVERY_FAILURE', details);
  }
}

export class UnexpectedPayloadError extends WatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UNEXPECTED_PAYLOAD', details);
  }
}

// API errors
export class ApiError extends WatchError {
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

export class RateLimitError extends ApiError {
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
export class NetworkError extends WatchError {
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

export class CircuitBreakerOpenError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
