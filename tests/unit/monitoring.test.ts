import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { initializeTracing, parseOtlpHeaders, tracingOptionsFromEnv } from '../../src/infra/monitoring/tracing.js';

describe('tracing', () => {
  it('should parse OTLP header lists', () => {
    expect(parseOtlpHeaders('api-key=test-key, x-tenant = acme ,broken,=nokey,empty=')).toEqual({
      'api-key': 'test-key',
      'x-tenant': 'acme',
    });
    expect(parseOtlpHeaders(undefined)).toEqual({});
  });

  it('should read options from the environment with defaults', () => {
    expect(tracingOptionsFromEnv({ OTEL_ENABLED: 'true', OTEL_EXPORTER_OTLP_ENDPOINT: 'http://collector:4318' })).toEqual({
      enabled: true,
      endpoint: 'http://collector:4318',
      headers: undefined,
      serviceName: 'catalog-service',
      serviceVersion: '1.0.0',
      environment: 'development',
      debug: false,
    });
  });

  it('should stay off when disabled or without an endpoint', () => {
    const base = tracingOptionsFromEnv({});

    expect(initializeTracing(base)).toBe(false);
    expect(initializeTracing({ ...base, enabled: true })).toBe(false);
  });
});

describe('instrumentation preload', () => {
  const packageScripts = z.object({ scripts: z.record(z.string()) });

  it('should load tracing ahead of the application in the start scripts', () => {
    const { scripts } = packageScripts.parse(
      JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'))
    );

    expect(scripts.start).toBe('node --import ./dist/instrumentation.js dist/index.js');
    expect(scripts.dev).toBe('tsx watch --import ./src/instrumentation.ts src/index.ts');
  });

  it('should import cleanly with tracing disabled', async () => {
    await expect(import('../../src/instrumentation.js')).resolves.toBeDefined();
    expect(initializeTracing(tracingOptionsFromEnv(process.env))).toBe(false);
  });
});
