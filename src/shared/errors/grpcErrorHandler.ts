/**
 * gRPC error responses.
 *
 * Handlers never fail the RPC itself for expected errors; they answer with a
 * payload the gateway maps back onto an HTTP status:
 * `{ success: false, message, error, status_code }`.
 */
import { ZodError } from 'zod';
import { AppError } from './AppError.js';

export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

const GENERIC_MESSAGE = 'An unexpected error occurred';

/**
 * HTTP-equivalent status for any thrown value.
 * AppError carries its own; zod failures are bad requests; everything else is a 500.
 */
export function extractStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  if (error instanceof ZodError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 600
  ) {
    return error.statusCode;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

export interface GrpcErrorResponse {
  success: false;
  message: string;
  error: string;
  status_code: number;
}

/**
 * Only operational errors expose their message; unexpected ones are replaced
 * so internals never reach the gateway.
 */
export function safeErrorMessage(error: unknown): string {
  if (isOperationalError(error)) {
    return error.message;
  }
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  }
  return GENERIC_MESSAGE;
}

export function createGrpcErrorResponse(error: unknown): GrpcErrorResponse {
  const message = safeErrorMessage(error);
  return {
    success: false,
    message,
    error: message,
    status_code: extractStatusCode(error),
  };
}

export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}
