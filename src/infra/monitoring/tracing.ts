// Started from src/instrumentation.ts, which is preloaded with --import so
// auto-instrumentation can patch http, mysql2, ioredis and amqplib as they
// are first imported. It must not import config or the logger for the same reason.

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';

export interface TracingOptions {
  enabled: boolean;
  endpoint?: string;
  headers?: string;
  serviceName: string;
  serviceVersion: string;
  environment: string;
  debug?: boolean;
}

let sdk: NodeSDK | null = null;

/**
 * "key=value,key2=value2" -> { key: 'value', key2: 'value2' }
 */
export function parseOtlpHeaders(headersString?: string): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!headersString) return headers;

  for (const pair of headersString.split(',')) {
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    const key = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (key && value) {
      headers[key] = value;
    }
  }
  return headers;
}

export function tracingOptionsFromEnv(env: NodeJS.ProcessEnv): TracingOptions {
  return {
    enabled: env.OTEL_ENABLED === 'true',
    endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
    headers: env.OTEL_EXPORTER_OTLP_HEADERS,
    serviceName: env.SERVICE_NAME || 'catalog-service',
    serviceVersion: env.SERVICE_VERSION || '1.0.0',
    environment: env.NODE_ENV || 'development',
    debug: env.OTEL_DEBUG === 'true',
  };
}

/**
 * Start the OpenTelemetry SDK. Returns false when tracing stays off.
 */
export function initializeTracing(options: TracingOptions = tracingOptionsFromEnv(process.env)): boolean {
  if (sdk) return true;

  if (!options.enabled) {
    return false;
  }

  if (!options.endpoint) {
    // eslint-disable-next-line no-console
    console.warn('[OTEL] OTEL_ENABLED is set but OTEL_EXPORTER_OTLP_ENDPOINT is missing');
    return false;
  }

  if (options.debug) {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
  }

  const headers = parseOtlpHeaders(options.headers);

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: options.serviceName,
      [ATTR_SERVICE_VERSION]: options.serviceVersion,
      'deployment.environment': options.environment,
    }),
    traceExporter: new OTLPTraceExporter({
      url: `${options.endpoint}/v1/traces`,
      headers,
    }),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({
        url: `${options.endpoint}/v1/metrics`,
        headers,
      }),
      exportIntervalMillis: 30000,
    }),
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fastify': { enabled: true },
        '@opentelemetry/instrumentation-http': { enabled: true },
        '@opentelemetry/instrumentation-fs': { enabled: false },
        '@opentelemetry/instrumentation-dns': { enabled: false },
        '@opentelemetry/instrumentation-pino': { enabled: false },
      }),
    ],
  });

  sdk.start();

  // eslint-disable-next-line no-console
  console.log(`[OTEL] OpenTelemetry exporting to ${options.endpoint}`);
  return true;
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  await sdk.shutdown();
  sdk = null;
}
