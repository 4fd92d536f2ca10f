/**
 * gRPC Context Interceptor
 *
 * @grpc/grpc-js has no server interceptors, so each handler is wrapped
 * instead. The wrapper reads tracing metadata and runs the handler inside a
 * RequestContext, which the logger mixin and outgoing clients read.
 *
 * Usage:
 *   server.addService(Service.service, {
 *     GetProduct: withRequestContext('GetProduct', logger, handlers.GetProduct),
 *   });
 */
import { randomUUID } from 'node:crypto';
import type * as grpc from '@grpc/grpc-js';
import { RequestContext, type RequestContextData } from '../../shared/context/RequestContext.js';
import type { Logger } from '../../infra/logger/logger.js';

const X_CORRELATION_ID_KEY = 'x-correlation-id';
const X_TRACE_ID_KEY = 'x-trace-id';

interface CallWithMetadata {
  metadata: grpc.Metadata;
}

function firstString(metadata: grpc.Metadata, key: string): string | undefined {
  const value = metadata.get(key)[0];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Build the request context from call metadata. A missing correlation id is
 * generated, falling back to the trace id when only that was sent.
 */
export function extractContext(metadata: grpc.Metadata): RequestContextData {
  const traceId = firstString(metadata, X_TRACE_ID_KEY);
  return {
    correlationId: firstString(metadata, X_CORRELATION_ID_KEY) ?? traceId ?? randomUUID(),
    traceId,
  };
}

/**
 * Wrap a single handler (unary or streaming) with RequestContext
 */
export function withRequestContext<TCall extends CallWithMetadata, TArgs extends unknown[]>(
  method: string,
  logger: Logger,
  handler: (call: TCall, ...args: TArgs) => void | Promise<void>
): (call: TCall, ...args: TArgs) => void {
  return (call, ...args) => {
    const context = extractContext(call.metadata);

    void RequestContext.runAsync(context, async () => {
      logger.debug({ method }, 'gRPC request received');
      await handler(call, ...args);
    }).catch((error: unknown) => {
      logger.error({ err: error, method, correlationId: context.correlationId }, 'Unhandled error in gRPC handler');
    });
  };
}
