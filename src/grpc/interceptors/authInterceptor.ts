/**
 * gRPC Bearer Authentication
 *
 * RPCs that change data follow the REST write policy. The caller sends
 * `authorization: Bearer <jwt>` metadata, verified with the HTTP API's
 * secret, algorithm and issuer, and must hold one of the required roles.
 * Rejections are thrown as AppErrors so the handler wrapper answers them
 * in-band (401, 403, or 503 when no secret is configured).
 */
import fastJwt from 'fast-jwt';
import type * as grpc from '@grpc/grpc-js';
import { z } from 'zod';
import type { EnvConfig } from '../../config/env.js';
import type { JwtPayload } from '../../app/middlewares/auth.js';
import type { Logger } from '../../infra/logger/logger.js';
import { RequestContext } from '../../shared/context/RequestContext.js';
import { AppError, ForbiddenError, UnauthorizedError } from '../../shared/errors/index.js';

const AUTHORIZATION_KEY = 'authorization';
const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

const tokenPayloadSchema = z
  .object({
    sub: z.string().min(1),
    email: z.string().optional(),
    roles: z.array(z.string()).optional(),
    iat: z.number().optional(),
    exp: z.number().optional(),
  })
  .passthrough();

export type TokenVerifier = (token: string) => JwtPayload;

/**
 * Synchronous HS256 verifier matching the HTTP JWT options,
 * or null when JWT_SECRET is unset
 */
export function createTokenVerifier(config: Pick<EnvConfig, 'JWT_SECRET' | 'JWT_ISSUER'>): TokenVerifier | null {
  if (!config.JWT_SECRET) {
    return null;
  }

  const verify = fastJwt.createVerifier({
    key: config.JWT_SECRET,
    algorithms: ['HS256'],
    allowedIss: config.JWT_ISSUER,
  });
  return (token) => tokenPayloadSchema.parse(verify(token));
}

function bearerToken(metadata: grpc.Metadata): string | undefined {
  const value = metadata.get(AUTHORIZATION_KEY)[0];
  if (typeof value !== 'string') {
    return undefined;
  }
  return BEARER_PATTERN.exec(value.trim())?.[1];
}

/**
 * Build a metadata check that passes callers holding any of `roles`
 */
export function requireGrpcRoles(
  verifier: TokenVerifier | null,
  logger: Logger,
  ...roles: string[]
): (metadata: grpc.Metadata) => JwtPayload {
  return (metadata) => {
    if (!verifier) {
      throw new AppError('Authentication is not configured', 503, 'AUTH_NOT_CONFIGURED');
    }

    const token = bearerToken(metadata);
    if (!token) {
      throw new UnauthorizedError('Authentication required');
    }

    let payload: JwtPayload;
    try {
      payload = verifier(token);
    } catch (err) {
      logger.warn({ err }, 'gRPC token verification failed');
      throw new UnauthorizedError('Invalid or expired token');
    }

    const userRoles = payload.roles ?? [];
    if (!roles.some((role) => userRoles.includes(role))) {
      logger.warn({ userId: payload.sub, requiredRoles: roles, userRoles }, 'Access denied - insufficient roles');
      throw new ForbiddenError('Insufficient permissions');
    }

    RequestContext.setUserId(payload.sub);
    return payload;
  };
}
