/**
 * Application error hierarchy. Every error a caller is expected to see
 * extends AppError and carries its HTTP status and a stable code.
 */

export interface ErrorDetails {
  field?: string;
  value?: unknown;
  constraint?: string;
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly timestamp: Date;
  /** Expected failures; anything else is treated as a programming error */
  public readonly isOperational: boolean = true;

  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: ErrorDetails | ErrorDetails[]
  ) {
    super(message);
    this.name = new.target.name;
    this.timestamp = new Date();
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/** 400 - invalid argument or request payload */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails | ErrorDetails[]) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Access denied') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string | number) {
    const message =
      identifier !== undefined
        ? `${resource} with ID '${identifier}' not found`
        : `${resource} not found`;
    super(message, 404, 'NOT_FOUND', { resource, identifier });
  }
}

/** 409 - duplicate or stale write */
export class ConflictError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 409, 'CONFLICT', details);
  }
}

export class BusinessRuleError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 422, 'BUSINESS_RULE_VIOLATION', details);
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter?: number) {
    super('Too many requests, please try again later', 429, 'RATE_LIMIT_EXCEEDED', {
      retryAfter,
    });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(service: string, message?: string) {
    super(message ?? `${service} is temporarily unavailable`, 503, 'SERVICE_UNAVAILABLE', {
      service,
    });
  }
}

/**
 * Raised while a circuit breaker rejects calls.
 * `remainingResetTime` is how long until the breaker lets a trial call through.
 */
export class CircuitBreakerOpenError extends AppError {
  constructor(
    public readonly circuit: string,
    public readonly remainingResetTime: number
  ) {
    super(
      `Circuit '${circuit}' is open, retry in ${Math.ceil(remainingResetTime / 1000)}s`,
      503,
      'CIRCUIT_OPEN',
      { circuit, remainingResetTime }
    );
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, 504, 'TIMEOUT', {
      operation,
      timeoutMs,
    });
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 500, 'DATABASE_ERROR', details);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, details?: ErrorDetails) {
    super(`${service}: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR', { service, ...details });
  }
}
