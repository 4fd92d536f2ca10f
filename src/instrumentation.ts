/**
 * OpenTelemetry preload.
 *
 * Must run before any application module so the auto-instrumentations can
 * patch http, fastify, mysql2, ioredis and amqplib as they are first imported:
 *   node --import ./dist/instrumentation.js dist/index.js
 *   tsx --import ./src/instrumentation.ts src/index.ts
 *
 * Only the env loader and the tracing module are imported here; config and
 * the logger would pull in instrumented libraries too early.
 */
import { loadEnvFiles } from './config/loadEnv.js';
import { initializeTracing } from './infra/monitoring/tracing.js';

loadEnvFiles();
initializeTracing();
