import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ZodType, ZodTypeDef, ZodError } from 'zod';
import logger from '../../infra/logger/logger.js';
import { formatZodIssues } from '../../shared/errors/index.js';

export interface ValidationErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  details: { field: string; message: string }[];
}

export function formatValidationError(error: ZodError): ValidationErrorResponse {
  return {
    statusCode: 400,
    error: 'Validation Error',
    message: 'Request validation failed',
    details: formatZodIssues(error),
  };
}

/**
 * Route handler that receives the parsed request
 */
export type ValidatedHandler<T, R> = (
  input: T,
  request: FastifyRequest,
  reply: FastifyReply
) => Promise<R>;

/**
 * Validate body, query and params in one pass.
 *
 * `schema` describes an object with optional `body`, `query` and `params`
 * keys, so issue paths read `params.id` or `body.name`. An invalid request
 * gets 400 before the handler runs.
 *
 * ```typescript
 * const getRequest = z.object({ params: z.object({ id: z.coerce.number() }) });
 * fastify.get('/:id', createValidator(getRequest, async ({ params }) => find(params.id)));
 * ```
 */
export function createValidator<T, R>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  handler: ValidatedHandler<T, R>
): (request: FastifyRequest, reply: FastifyReply) => Promise<R | ValidationErrorResponse> {
  return async (request, reply) => {
    const parsed = schema.safeParse({
      body: request.body,
      query: request.query,
      params: request.params,
    });

    if (!parsed.success) {
      logger.warn({ url: request.url, errors: parsed.error.issues }, 'Request validation failed');
      const response = formatValidationError(parsed.error);
      void reply.status(400);
      return response;
    }

    return handler(parsed.data, request, reply);
  };
}
