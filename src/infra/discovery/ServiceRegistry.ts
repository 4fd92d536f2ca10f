/**
 * Service Registry
 *
 * In-process registry of downstream service instances. Instances come either
 * from the static SERVICE_REGISTRY setting or from runtime registration with
 * heartbeats. Resolution is round-robin over healthy instances.
 */
import { EventEmitter } from 'node:events';
import { ServiceUnavailableError, ValidationError } from '../../shared/errors/index.js';
import type { Logger } from '../logger/logger.js';

export interface ServiceInstance {
  id: string;
  service: string;
  host: string;
  port: number;
  /** Static instances come from configuration and never expire */
  static?: boolean;
  metadata?: Record<string, string>;
}

export interface RegisteredInstance extends ServiceInstance {
  healthy: boolean;
  registeredAt: number;
  lastHeartbeat: number;
  /** Set while the instance is marked unhealthy */
  unhealthySince?: number;
}

export interface ServiceRegistryOptions {
  /** Heartbeat TTL for dynamic instances */
  ttlMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface GetInstancesOptions {
  healthyOnly?: boolean;
}

const DEFAULT_TTL_MS = 30000;

export class ServiceRegistry extends EventEmitter {
  private readonly instances = new Map<string, RegisteredInstance>();
  private readonly cursors = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(options: ServiceRegistryOptions = {}) {
    super();
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Parse "inventory=host:port,host2:port;pricing=host:port" into static instances.
   */
  static parse(value: string): ServiceInstance[] {
    const result: ServiceInstance[] = [];

    for (const entry of value.split(';')) {
      const trimmed = entry.trim();
      if (!trimmed) {
        continue;
      }

      const separator = trimmed.indexOf('=');
      if (separator <= 0) {
        throw new ValidationError(`Invalid service registry entry: "${trimmed}"`);
      }

      const service = trimmed.slice(0, separator).trim();
      const addresses = trimmed
        .slice(separator + 1)
        .split(',')
        .map((address) => address.trim())
        .filter(Boolean);

      addresses.forEach((address, index) => {
        const colon = address.lastIndexOf(':');
        const host = colon > 0 ? address.slice(0, colon) : '';
        const port = Number(address.slice(colon + 1));

        if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) {
          throw new ValidationError(`Invalid address "${address}" for service "${service}"`);
        }

        result.push({ id: `${service}-${index + 1}`, service, host, port, static: true });
      });
    }

    return result;
  }

  static fromConfig(value: string, options: ServiceRegistryOptions = {}): ServiceRegistry {
    const registry = new ServiceRegistry(options);
    for (const instance of ServiceRegistry.parse(value)) {
      registry.register(instance);
    }
    return registry;
  }

  register(instance: ServiceInstance): RegisteredInstance {
    const timestamp = this.now();
    const registered: RegisteredInstance = {
      ...instance,
      healthy: true,
      registeredAt: this.instances.get(instance.id)?.registeredAt ?? timestamp,
      lastHeartbeat: timestamp,
    };

    this.instances.set(instance.id, registered);
    this.logger?.info(
      { service: instance.service, instanceId: instance.id, address: `${instance.host}:${instance.port}` },
      'Service instance registered'
    );
    this.emit('registered', registered);
    return registered;
  }

  deregister(id: string): boolean {
    const instance = this.instances.get(id);
    if (!instance) {
      return false;
    }

    this.instances.delete(id);
    this.logger?.info({ service: instance.service, instanceId: id }, 'Service instance deregistered');
    this.emit('deregistered', instance);
    return true;
  }

  /**
   * Refresh an instance and mark it healthy again. Returns false for unknown ids.
   */
  heartbeat(id: string): boolean {
    const instance = this.instances.get(id);
    if (!instance) {
      return false;
    }

    instance.lastHeartbeat = this.now();
    instance.healthy = true;
    instance.unhealthySince = undefined;
    return true;
  }

  markUnhealthy(id: string): boolean {
    const instance = this.instances.get(id);
    if (!instance) {
      return false;
    }

    if (instance.healthy) {
      instance.healthy = false;
      instance.unhealthySince = this.now();
      this.logger?.warn({ service: instance.service, instanceId: id }, 'Service instance marked unhealthy');
      this.emit('unhealthy', instance);
    }
    return true;
  }

  getInstances(service: string, options: GetInstancesOptions = {}): RegisteredInstance[] {
    return [...this.instances.values()].filter(
      (instance) => instance.service === service && (!options.healthyOnly || instance.healthy)
    );
  }

  hasService(service: string): boolean {
    return this.getInstances(service).length > 0;
  }

  listServices(): string[] {
    return [...new Set([...this.instances.values()].map((instance) => instance.service))];
  }

  /**
   * Pick the next healthy instance for a service.
   */
  resolve(service: string): RegisteredInstance {
    const healthy = this.getInstances(service, { healthyOnly: true });

    if (healthy.length === 0) {
      throw new ServiceUnavailableError(service, `No healthy instances registered for ${service}`);
    }

    const cursor = this.cursors.get(service) ?? 0;
    const instance = healthy[cursor % healthy.length];
    this.cursors.set(service, (cursor + 1) % healthy.length);

    if (!instance) {
      throw new ServiceUnavailableError(service);
    }
    return instance;
  }

  resolveAddress(service: string): string {
    const instance = this.resolve(service);
    return `${instance.host}:${instance.port}`;
  }

  /**
   * Drop dynamic instances whose last heartbeat is older than the TTL.
   * Static instances get no heartbeats, so one that has been unhealthy for
   * longer than the TTL is put back into rotation instead.
   */
  evictExpired(now: number = this.now()): string[] {
    const evicted: string[] = [];

    for (const instance of this.instances.values()) {
      if (!instance.static) {
        if (now - instance.lastHeartbeat > this.ttlMs) {
          evicted.push(instance.id);
        }
      } else if (instance.unhealthySince !== undefined && now - instance.unhealthySince > this.ttlMs) {
        this.revive(instance);
      }
    }

    for (const id of evicted) {
      this.deregister(id);
    }
    return evicted;
  }

  private revive(instance: RegisteredInstance): void {
    instance.healthy = true;
    instance.unhealthySince = undefined;
    this.logger?.info({ service: instance.service, instanceId: instance.id }, 'Service instance back in rotation');
    this.emit('recovered', instance);
  }
}
