import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  AppError,
  BusinessRuleError,
  CircuitBreakerOpenError,
  ConflictError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  createGrpcErrorResponse,
  errorHandler,
  extractStatusCode,
  notFoundHandler,
} from '../../src/shared/errors/index.js';

describe('errorHandler', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify();
    app.setErrorHandler(errorHandler);
    app.setNotFoundHandler(notFoundHandler);

    app.get('/not-found', async () => {
      throw new NotFoundError('Product', 5);
    });
    app.get('/zod', async () => z.object({ name: z.string() }).parse({}));
    app.get('/jwt', async () => {
      const error = new Error('jwt expired');
      error.name = 'TokenExpiredError';
      throw error;
    });
    app.get('/bug', async () => {
      throw new TypeError('cannot read properties of undefined');
    });
    app.get('/limited', async () => {
      throw new RateLimitError(30);
    });
    app.post('/echo', async (request) => request.body);

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should render AppError with its status, code and details', async () => {
    const response = await app.inject({ method: 'GET', url: '/not-found' });
    const body = response.json();

    expect(response.statusCode).toBe(404);
    expect(body).toMatchObject({
      error: 'NOT_FOUND',
      message: "Product with ID '5' not found",
      statusCode: 404,
      details: { resource: 'Product', identifier: 5 },
      requestId: expect.any(String),
      timestamp: expect.any(String),
    });
  });

  it('should render ZodError as a 400 with field details', async () => {
    const response = await app.inject({ method: 'GET', url: '/zod' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      error: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: [{ field: 'name', message: 'Required' }],
    });
  });

  it('should render JWT errors as 401', async () => {
    const response = await app.inject({ method: 'GET', url: '/jwt' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toMatchObject({ error: 'AUTHENTICATION_ERROR', message: 'Invalid or expired token' });
  });

  it('should keep Fastify client errors such as malformed JSON', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/echo',
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ statusCode: 400, requestId: expect.any(String) });
  });

  it('should render unknown errors as 500 INTERNAL_ERROR', async () => {
    const response = await app.inject({ method: 'GET', url: '/bug' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toMatchObject({
      error: 'INTERNAL_ERROR',
      // Messages are exposed in test and development only
      message: 'cannot read properties of undefined',
    });
  });

  it('should carry retryAfter on rate limit errors', async () => {
    const response = await app.inject({ method: 'GET', url: '/limited' });

    expect(response.statusCode).toBe(429);
    expect(response.json()).toMatchObject({ error: 'RATE_LIMIT_EXCEEDED', details: { retryAfter: 30 } });
  });

  it('should answer unknown routes with ROUTE_NOT_FOUND', async () => {
    const response = await app.inject({ method: 'GET', url: '/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ error: 'ROUTE_NOT_FOUND', message: 'Route GET /nowhere not found' });
  });
});

describe('gRPC error responses', () => {
  it('should keep operational messages and statuses', () => {
    expect(createGrpcErrorResponse(new ConflictError('Product with name "Desk" already exists'))).toEqual({
      success: false,
      message: 'Product with name "Desk" already exists',
      error: 'Product with name "Desk" already exists',
      status_code: 409,
    });
    expect(createGrpcErrorResponse(new CircuitBreakerOpenError('inventory', 1500)).status_code).toBe(503);
  });

  it('should hide the message of unexpected errors', () => {
    expect(createGrpcErrorResponse(new Error('db password wrong'))).toEqual({
      success: false,
      message: 'An unexpected error occurred',
      error: 'An unexpected error occurred',
      status_code: 500,
    });
  });

  it('should describe zod failures as bad requests', () => {
    const result = z.object({ id: z.number() }).safeParse({ id: 'x' });
    const error = result.success ? null : result.error;

    expect(createGrpcErrorResponse(error)).toEqual({
      success: false,
      message: 'id: Expected number, received string',
      error: 'id: Expected number, received string',
      status_code: 400,
    });
  });

  it('should extract status codes from any error shape', () => {
    expect(extractStatusCode(new ValidationError('bad'))).toBe(400);
    expect(extractStatusCode(new BusinessRuleError('rule'))).toBe(422);
    expect(extractStatusCode(new AppError('custom', 418, 'TEAPOT'))).toBe(418);
    expect(extractStatusCode({ statusCode: 413 })).toBe(413);
    expect(extractStatusCode({ statusCode: 200 })).toBe(500);
    expect(extractStatusCode('boom')).toBe(500);
  });
});
