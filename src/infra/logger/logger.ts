import type { Logger as PinoLogger, LoggerOptions } from 'pino';
import pino from 'pino';
import config from '../../config/env.js';
import { RequestContext } from '../../shared/context/RequestContext.js';

export type Logger = PinoLogger;

/**
 * Paths censored in every log line
 */
const REDACT_PATHS = [
  'password',
  'token',
  'accessToken',
  'refreshToken',
  'apiKey',
  'secret',
  'authorization',
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'body.password',
  'body.token',
  'connectionString',
  'DB_PASSWORD',
  'REDIS_PASSWORD',
  'JWT_SECRET',
  'RABBITMQ_URL',
  'SENTRY_DSN',
];

/**
 * Pulls correlation data from the active request, so it shows up on every
 * line without threading a child logger through the call chain.
 */
export function contextMixin(): Record<string, string> {
  const context = RequestContext.get();
  if (!context) return {};

  const bindings: Record<string, string> = { correlationId: context.correlationId };
  if (context.userId) bindings.userId = context.userId;
  if (context.traceId) bindings.traceId = context.traceId;
  return bindings;
}

/**
 * Options shared by the application logger and Fastify's request logger
 */
export function buildLoggerOptions(): LoggerOptions {
  const base: LoggerOptions = {
    level: config.LOG_LEVEL,
    mixin: contextMixin,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.NODE_ENV === 'test') {
    return { ...base, level: 'silent' };
  }

  if (config.NODE_ENV === 'development') {
    return {
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    };
  }

  return {
    ...base,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: config.SERVICE_NAME,
      version: config.SERVICE_VERSION,
      env: config.NODE_ENV,
    },
  };
}

class LoggerFactory {
  private static instance: Logger | null = null;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = pino(buildLoggerOptions());
    }
    return this.instance;
  }

  static createChild(bindings: Record<string, unknown>): Logger {
    return this.getInstance().child(bindings);
  }

  static reset(): void {
    this.instance = null;
  }
}

const logger = LoggerFactory.getInstance();

export default logger;
export { LoggerFactory };
