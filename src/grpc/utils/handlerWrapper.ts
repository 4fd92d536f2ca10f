/**
 * Generic gRPC handler wrapper.
 *
 * Runs the optional `authorize` check and then the handler, answers with its
 * result, and turns any thrown error into the in-band
 * `{ success: false, message, error, status_code }` payload.
 *
 * @example
 * const getProduct = createGrpcHandler<GetProductRequest, ProductResponse>({
 *   name: 'GetProduct',
 *   logger,
 *   handler: async (request) => ({ ... }),
 * });
 */
import type * as grpc from '@grpc/grpc-js';
import type { Logger } from '../../infra/logger/logger.js';
import { createGrpcErrorResponse, isOperationalError } from '../../shared/errors/index.js';
import type { GrpcCallback, Reply } from '../types/common.types.js';

type Handler<TRequest, TResponse> = (request: TRequest) => Promise<TResponse>;

interface GrpcHandlerOptions<TRequest, TResponse> {
  /** RPC method name, for logging */
  name: string;
  logger: Logger;
  /** Throws to reject the call before the handler runs */
  authorize?: (metadata: grpc.Metadata) => unknown;
  handler: Handler<TRequest, TResponse>;
}

export type UnaryHandler<TRequest, TResponse> = (
  call: grpc.ServerUnaryCall<TRequest, Reply<TResponse>>,
  callback: GrpcCallback<Reply<TResponse>>
) => Promise<void>;

export function createGrpcHandler<TRequest, TResponse>(
  options: GrpcHandlerOptions<TRequest, TResponse>
): UnaryHandler<TRequest, TResponse> {
  const { name, logger, authorize, handler } = options;

  return async (call, callback) => {
    try {
      authorize?.(call.metadata);
      callback(null, await handler(call.request));
    } catch (error) {
      if (isOperationalError(error)) {
        logger.debug({ err: error, method: name }, `gRPC ${name} rejected`);
      } else {
        logger.error({ err: error, method: name }, `gRPC ${name} failed`);
      }
      callback(null, createGrpcErrorResponse(error));
    }
  };
}
