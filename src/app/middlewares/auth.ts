import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { FastifyJWTOptions } from '@fastify/jwt';
import fastifyJwt from '@fastify/jwt';
import type { EnvConfig } from '../../config/env.js';
import logger from '../../infra/logger/logger.js';
import { setUser } from '../../infra/monitoring/sentry.js';
import { RequestContext } from '../../shared/context/RequestContext.js';
import { AppError, ForbiddenError, UnauthorizedError } from '../../shared/errors/index.js';

export const ROLES = {
  ADMIN: 'admin',
  CATALOG_WRITE: 'catalog:write',
} as const;

export interface JwtPayload {
  sub: string;
  email?: string;
  roles?: string[];
  iat?: number;
  exp?: number;
}

declare module 'fastify' {
  interface FastifyRequest {
    userId?: string;
    userRoles?: string[];
  }

  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JwtPayload;
    user: JwtPayload;
  }
}

function attachUser(request: FastifyRequest, payload: JwtPayload): void {
  request.userId = payload.sub;
  request.userRoles = payload.roles ?? [];
  RequestContext.setUserId(payload.sub);
  setUser({ id: payload.sub });
}

/**
 * Register JWT authentication.
 *
 * Without JWT_SECRET the plugin is skipped and `authenticate` rejects every
 * call with 503 AUTH_NOT_CONFIGURED, so protected routes stay closed.
 */
export async function registerJwtAuth(fastify: FastifyInstance, config: EnvConfig): Promise<void> {
  if (!config.JWT_SECRET) {
    logger.warn('JWT_SECRET not configured, protected routes are disabled');

    fastify.decorate('authenticate', async () => {
      throw new AppError('Authentication is not configured', 503, 'AUTH_NOT_CONFIGURED');
    });
    return;
  }

  const jwtOptions: FastifyJWTOptions = {
    secret: config.JWT_SECRET,
    sign: {
      algorithm: 'HS256',
      expiresIn: config.JWT_EXPIRES_IN,
      iss: config.JWT_ISSUER,
    },
    verify: {
      algorithms: ['HS256'],
      allowedIss: config.JWT_ISSUER,
    },
  };
  await fastify.register(fastifyJwt, jwtOptions);

  // Identify the caller early so the rate limiter can key on the user.
  // A bad token is only rejected by routes that require authentication.
  fastify.addHook('onRequest', async (request) => {
    if (!request.headers.authorization) {
      return;
    }
    try {
      attachUser(request, await request.jwtVerify<JwtPayload>());
    } catch (err) {
      request.log.debug({ err }, 'Ignoring invalid bearer token on onRequest');
    }
  });

  fastify.decorate('authenticate', async (request: FastifyRequest) => {
    if (request.userId) {
      return;
    }
    try {
      attachUser(request, await request.jwtVerify<JwtPayload>());
    } catch (err) {
      logger.warn({ err }, 'JWT verification failed');
      throw new UnauthorizedError('Invalid or expired token');
    }
  });

  logger.info('JWT authentication registered');
}

export function generateToken(fastify: FastifyInstance, payload: JwtPayload): string {
  return fastify.jwt.sign(payload);
}

/**
 * Role-based access control, to run after `authenticate`.
 * Passes when the user holds any of the given roles.
 */
export function requireRoles(...roles: string[]) {
  return async (request: FastifyRequest): Promise<void> => {
    if (!request.userId) {
      throw new UnauthorizedError('Authentication required');
    }

    const userRoles = request.userRoles ?? [];
    if (!roles.some((role) => userRoles.includes(role))) {
      logger.warn(
        { userId: request.userId, requiredRoles: roles, userRoles },
        'Access denied - insufficient roles'
      );
      throw new ForbiddenError('Insufficient permissions');
    }
  };
}
