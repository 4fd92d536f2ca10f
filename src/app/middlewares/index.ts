export { registerCorrelationId } from './correlationId.js';
export { registerRateLimiter } from './rateLimiter.js';
export { registerJwtAuth, generateToken, requireRoles, ROLES, type JwtPayload } from './auth.js';
export { createValidator, formatValidationError, type ValidatedHandler } from './requestValidator.js';
export { registerBackpressure, getBackpressureMetrics, type BackpressureMetrics } from './backpressure.js';
export { registerRequestMetrics } from './requestMetrics.js';
