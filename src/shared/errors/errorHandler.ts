/**
 * Centralized HTTP error handling.
 * Every failure leaves the service in the same envelope:
 * `{ error, message, statusCode, details?, requestId, timestamp }`.
 */
import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import config from '../../config/env.js';
import logger from '../../infra/logger/logger.js';
import { captureException } from '../../infra/monitoring/sentry.js';
import { AppError } from './AppError.js';

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
  requestId?: string;
  timestamp: string;
}

const JWT_ERROR_NAMES = new Set(['JsonWebTokenError', 'TokenExpiredError', 'NotBeforeError']);

export function formatZodIssues(error: ZodError): { field: string; message: string }[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join('.'),
    message: issue.message,
  }));
}

export function createErrorResponse(
  code: string,
  message: string,
  statusCode: number,
  requestId?: string,
  details?: unknown
): ErrorResponse {
  return {
    error: code,
    message,
    statusCode,
    details,
    requestId,
    timestamp: new Date().toISOString(),
  };
}

function isClientError(error: FastifyError | Error): error is FastifyError {
  return (
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

/**
 * Global error handler for Fastify.
 * Register with `fastify.setErrorHandler(errorHandler)`.
 */
export function errorHandler(
  error: FastifyError | AppError | ZodError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const requestId = request.id;

  // 1. Our own errors
  if (error instanceof AppError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(
      { requestId, error: error.code, statusCode: error.statusCode, details: error.details },
      error.message
    );

    void reply
      .status(error.statusCode)
      .send(
        createErrorResponse(error.code, error.message, error.statusCode, requestId, error.details)
      );
    return;
  }

  // 2. Zod validation errors thrown from handlers or use cases
  if (error instanceof ZodError) {
    const details = formatZodIssues(error);
    logger.warn({ requestId, error: 'VALIDATION_ERROR', details }, 'Validation failed');

    void reply
      .status(400)
      .send(createErrorResponse('VALIDATION_ERROR', 'Validation failed', 400, requestId, details));
    return;
  }

  // 3. Fastify schema validation
  if ('validation' in error && error.validation) {
    logger.warn({ requestId, validation: error.validation }, 'Schema validation failed');

    void reply
      .status(400)
      .send(
        createErrorResponse('VALIDATION_ERROR', error.message, 400, requestId, error.validation)
      );
    return;
  }

  // 4. JWT errors
  if (JWT_ERROR_NAMES.has(error.name)) {
    logger.warn({ requestId, reason: error.message }, 'Token rejected');

    void reply
      .status(401)
      .send(
        createErrorResponse('AUTHENTICATION_ERROR', 'Invalid or expired token', 401, requestId)
      );
    return;
  }

  // 5. Client errors raised by Fastify itself (malformed JSON, payload too large, ...)
  if (isClientError(error)) {
    logger.warn({ requestId, code: error.code }, error.message);

    const statusCode = error.statusCode ?? 400;
    void reply
      .status(statusCode)
      .send(createErrorResponse(error.code, error.message, statusCode, requestId));
    return;
  }

  // 6. Anything else is a bug
  logger.error({ requestId, err: error }, 'Unhandled error');

  captureException(error, {
    requestId,
    url: request.url,
    method: request.method,
  });

  const exposeMessage = config.NODE_ENV === 'development' || config.NODE_ENV === 'test';
  const message = exposeMessage ? error.message : 'An unexpected error occurred';

  void reply.status(500).send(createErrorResponse('INTERNAL_ERROR', message, 500, requestId));
}

export function notFoundHandler(request: FastifyRequest, reply: FastifyReply): void {
  logger.debug({ requestId: request.id, url: request.url, method: request.method }, 'Route not found');

  void reply
    .status(404)
    .send(
      createErrorResponse(
        'ROUTE_NOT_FOUND',
        `Route ${request.method} ${request.url} not found`,
        404,
        request.id
      )
    );
}
