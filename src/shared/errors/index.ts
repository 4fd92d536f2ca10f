export {
  AppError,
  ValidationError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  ConflictError,
  BusinessRuleError,
  RateLimitError,
  ServiceUnavailableError,
  CircuitBreakerOpenError,
  TimeoutError,
  DatabaseError,
  ExternalServiceError,
  type ErrorDetails,
} from './AppError.js';

export {
  errorHandler,
  notFoundHandler,
  createErrorResponse,
  formatZodIssues,
  type ErrorResponse,
} from './errorHandler.js';

export {
  HttpStatus,
  extractStatusCode,
  createGrpcErrorResponse,
  safeErrorMessage,
  isOperationalError,
  type GrpcErrorResponse,
} from './grpcErrorHandler.js';
