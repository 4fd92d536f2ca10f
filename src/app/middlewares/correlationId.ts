import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';
import { RequestContext } from '../../shared/context/RequestContext.js';

export const CORRELATION_ID_HEADER = 'x-correlation-id';
export const REQUEST_ID_HEADER = 'x-request-id';
export const TRACE_ID_HEADER = 'x-trace-id';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
    requestId: string;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

/**
 * Register correlation ID middleware
 * - Echoes x-correlation-id (or x-request-id) from the caller, or generates one
 * - Opens the RequestContext read by the logger mixin
 */
export function registerCorrelationId(fastify: FastifyInstance): void {
  fastify.decorateRequest('correlationId', '');
  fastify.decorateRequest('requestId', '');

  fastify.addHook('onRequest', (request: FastifyRequest, reply: FastifyReply, done) => {
    const correlationId =
      headerValue(request.headers[CORRELATION_ID_HEADER]) ??
      headerValue(request.headers[REQUEST_ID_HEADER]) ??
      randomUUID();

    request.correlationId = correlationId;
    request.requestId = request.id;

    void reply.header(CORRELATION_ID_HEADER, correlationId);
    void reply.header(REQUEST_ID_HEADER, request.id);

    RequestContext.enter({
      correlationId,
      traceId: headerValue(request.headers[TRACE_ID_HEADER]),
    });

    request.log = request.log.child({ correlationId, requestId: request.id });
    done();
  });
}
