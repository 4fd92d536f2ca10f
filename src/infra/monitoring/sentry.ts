import * as Sentry from '@sentry/node';
import config from '../../config/env.js';
import logger from '../logger/logger.js';

type SamplingContext = Parameters<NonNullable<Sentry.NodeOptions['tracesSampler']>>[0];

const UNSAMPLED_ROUTES = ['/health', '/ready', '/metrics', '/status'];

let isInitialized = false;

function defaultSampleRate(): number {
  switch (config.NODE_ENV) {
    case 'development':
      return 1.0;
    case 'staging':
      return 0.2;
    case 'production':
      return 0.05;
    default:
      return 0.1;
  }
}

function transactionTarget(ctx: SamplingContext): string {
  if (ctx.name) return ctx.name;
  const target = ctx.attributes?.['http.target'];
  return typeof target === 'string' ? target : '';
}

/**
 * Follows the parent decision for distributed traces and never samples
 * health checks or metrics scrapes.
 */
export function tracesSampler(ctx: SamplingContext): number {
  if (ctx.parentSampled !== undefined) {
    return ctx.parentSampled ? 1.0 : 0;
  }

  const target = transactionTarget(ctx);
  if (UNSAMPLED_ROUTES.some((route) => target.includes(route))) {
    return 0;
  }

  return config.SENTRY_TRACES_SAMPLE_RATE ?? defaultSampleRate();
}

export function initializeSentry(): void {
  if (!config.SENTRY_DSN) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  if (isInitialized) {
    logger.warn('Sentry already initialized');
    return;
  }

  Sentry.init({
    dsn: config.SENTRY_DSN,
    environment: config.SENTRY_ENVIRONMENT ?? config.NODE_ENV,
    release: `${config.SERVICE_NAME}@${config.SERVICE_VERSION}`,
    tracesSampler,
    enabled: config.NODE_ENV !== 'test',
    integrations: [
      Sentry.httpIntegration(),
      Sentry.mysqlIntegration(),
      Sentry.redisIntegration(),
      Sentry.amqplibIntegration(),
    ],
    beforeSend(event) {
      event.tags = {
        ...event.tags,
        service: config.SERVICE_NAME,
        environment: config.NODE_ENV,
      };
      return event;
    },
  });

  isInitialized = true;
  logger.info({ environment: config.NODE_ENV }, 'Sentry initialized');
}

export function captureException(error: Error, context?: Record<string, unknown>): string {
  if (!isInitialized) {
    return '';
  }
  return Sentry.captureException(error, { extra: context });
}

export function setUser(user: { id: string }): void {
  if (isInitialized) {
    Sentry.setUser(user);
  }
}

export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!isInitialized) return true;
  return Sentry.flush(timeout);
}

export async function closeSentry(): Promise<void> {
  if (isInitialized) {
    await Sentry.close();
    isInitialized = false;
  }
}
