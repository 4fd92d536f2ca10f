/**
 * gRPC Module Exports
 */
export {
  buildGrpcServer,
  startGrpcServer,
  stopGrpcServer,
  PRODUCT_SERVICE_NAME,
} from './server.js';
export { createProductServiceHandlers, toProductMessage } from './handlers/productHandler.js';
export { createHealthServiceHandlers, ServingStatus } from './handlers/healthHandler.js';
export { withRequestContext, extractContext } from './interceptors/contextInterceptor.js';
export { createTokenVerifier, requireGrpcRoles, type TokenVerifier } from './interceptors/authInterceptor.js';
export { createGrpcHandler } from './utils/handlerWrapper.js';
export type * from './types/common.types.js';
