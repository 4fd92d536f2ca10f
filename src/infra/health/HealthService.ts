/**
 * Health Service
 * Registry of named component checks with a short-lived result cache
 */
import type { Logger } from '../logger/logger.js';

export type ComponentStatus = 'healthy' | 'unhealthy' | 'degraded' | 'not_configured';
export type OverallStatus = Exclude<ComponentStatus, 'not_configured'>;

export interface ComponentHealth {
  status: ComponentStatus;
  latencyMs?: number;
  message?: string;
  details?: Record<string, unknown>;
}

export type HealthCheck = () => ComponentHealth | Promise<ComponentHealth>;

export interface HealthCheckResult {
  status: OverallStatus;
  timestamp: string;
  service: string;
  version: string;
  uptime: number;
  components: Record<string, ComponentHealth>;
}

export interface ReadinessResult {
  ready: boolean;
  checks: Record<string, boolean>;
}

export interface HealthServiceOptions {
  serviceName: string;
  serviceVersion: string;
  /** How long a full check result is reused (0 disables caching) */
  cacheMs?: number;
  now?: () => number;
}

/**
 * unhealthy > degraded > healthy; not_configured components do not count
 */
export function aggregateStatus(components: Iterable<ComponentHealth>): OverallStatus {
  let overall: OverallStatus = 'healthy';
  for (const component of components) {
    if (component.status === 'unhealthy') {
      return 'unhealthy';
    }
    if (component.status === 'degraded') {
      overall = 'degraded';
    }
  }
  return overall;
}

export class HealthService {
  private readonly checks = new Map<string, HealthCheck>();
  private cached: { result: HealthCheckResult; at: number } | null = null;
  private inFlight: Promise<HealthCheckResult> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly options: HealthServiceOptions,
    private readonly logger: Logger
  ) {
    this.now = options.now ?? Date.now;
  }

  register(name: string, check: HealthCheck): void {
    this.checks.set(name, check);
    this.cached = null;
  }

  unregister(name: string): void {
    this.checks.delete(name);
    this.cached = null;
  }

  getComponentNames(): string[] {
    return [...this.checks.keys()];
  }

  async check(): Promise<HealthCheckResult> {
    const cacheMs = this.options.cacheMs ?? 0;
    if (this.cached && this.now() - this.cached.at < cacheMs) {
      return this.cached.result;
    }

    // Concurrent requests share one round of checks
    if (!this.inFlight) {
      this.inFlight = this.runChecks().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async readiness(): Promise<ReadinessResult> {
    const result = await this.check();
    const checks: Record<string, boolean> = {};

    for (const [name, component] of Object.entries(result.components)) {
      if (component.status !== 'not_configured') {
        checks[name] = component.status !== 'unhealthy';
      }
    }

    return { ready: result.status !== 'unhealthy', checks };
  }

  private async runChecks(): Promise<HealthCheckResult> {
    const entries = await Promise.all(
      [...this.checks.entries()].map(
        async ([name, check]): Promise<[string, ComponentHealth]> => [name, await this.runCheck(name, check)]
      )
    );
    const components = Object.fromEntries(entries);

    const result: HealthCheckResult = {
      status: aggregateStatus(Object.values(components)),
      timestamp: new Date(this.now()).toISOString(),
      service: this.options.serviceName,
      version: this.options.serviceVersion,
      uptime: process.uptime(),
      components,
    };

    this.cached = { result, at: this.now() };
    return result;
  }

  private async runCheck(name: string, check: HealthCheck): Promise<ComponentHealth> {
    try {
      return await check();
    } catch (error) {
      this.logger.error({ err: error, component: name }, 'Health check failed');
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Health check failed',
      };
    }
  }
}
