import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ServiceRegistry } from '../../src/infra/discovery/index.js';
import { ServiceUnavailableError, ValidationError } from '../../src/shared/errors/index.js';

describe('ServiceRegistry', () => {
  let clock: number;
  let registry: ServiceRegistry;

  beforeEach(() => {
    clock = 1_000_000;
    registry = new ServiceRegistry({ ttlMs: 5000, now: () => clock });
  });

  describe('parse', () => {
    it('should build static instances per service', () => {
      expect(ServiceRegistry.parse('inventory=10.0.0.1:50051, 10.0.0.2:50051;pricing=pricing:7000')).toEqual([
        { id: 'inventory-1', service: 'inventory', host: '10.0.0.1', port: 50051, static: true },
        { id: 'inventory-2', service: 'inventory', host: '10.0.0.2', port: 50051, static: true },
        { id: 'pricing-1', service: 'pricing', host: 'pricing', port: 7000, static: true },
      ]);
    });

    it('should return nothing for an empty value', () => {
      expect(ServiceRegistry.parse('')).toEqual([]);
      expect(ServiceRegistry.parse(' ; ')).toEqual([]);
    });

    it.each(['inventory', '=host:1', 'inventory=host', 'inventory=host:0', 'inventory=host:70000', 'inventory=:50051'])(
      'should reject "%s"',
      (value) => {
        expect(() => ServiceRegistry.parse(value)).toThrow(ValidationError);
      }
    );
  });

  describe('resolve', () => {
    it('should rotate over healthy instances', () => {
      registry = ServiceRegistry.fromConfig('inventory=a:1,b:2,c:3');

      expect([1, 2, 3, 4].map(() => registry.resolveAddress('inventory'))).toEqual(['a:1', 'b:2', 'c:3', 'a:1']);
    });

    it('should skip unhealthy instances', () => {
      registry = ServiceRegistry.fromConfig('inventory=a:1,b:2');
      registry.markUnhealthy('inventory-1');

      expect(registry.resolveAddress('inventory')).toBe('b:2');
      expect(registry.resolveAddress('inventory')).toBe('b:2');
    });

    it('should throw ServiceUnavailableError without healthy instances', () => {
      expect(() => registry.resolve('inventory')).toThrow(ServiceUnavailableError);
      expect(() => registry.resolve('inventory')).toThrow('No healthy instances registered for inventory');
    });
  });

  describe('register / deregister', () => {
    it('should emit lifecycle events', () => {
      const registered = vi.fn();
      const deregistered = vi.fn();
      registry.on('registered', registered);
      registry.on('deregistered', deregistered);

      registry.register({ id: 'inv-a', service: 'inventory', host: 'a', port: 1 });

      expect(registered).toHaveBeenCalledWith(
        expect.objectContaining({ id: 'inv-a', healthy: true, registeredAt: clock, lastHeartbeat: clock })
      );
      expect(registry.deregister('inv-a')).toBe(true);
      expect(registry.deregister('inv-a')).toBe(false);
      expect(deregistered).toHaveBeenCalledTimes(1);
      expect(registry.hasService('inventory')).toBe(false);
    });

    it('should keep the original registration time on re-register', () => {
      registry.register({ id: 'inv-a', service: 'inventory', host: 'a', port: 1 });
      clock += 1000;

      const again = registry.register({ id: 'inv-a', service: 'inventory', host: 'a', port: 2 });

      expect(again.registeredAt).toBe(1_000_000);
      expect(again.lastHeartbeat).toBe(1_001_000);
      expect(registry.getInstances('inventory')).toHaveLength(1);
    });

    it('should list registered services once each', () => {
      registry = ServiceRegistry.fromConfig('inventory=a:1,b:2;pricing=c:3');

      expect(registry.listServices()).toEqual(['inventory', 'pricing']);
    });
  });

  describe('heartbeat and eviction', () => {
    it('should restore health on heartbeat', () => {
      registry.register({ id: 'inv-a', service: 'inventory', host: 'a', port: 1 });
      registry.markUnhealthy('inv-a');

      expect(registry.getInstances('inventory', { healthyOnly: true })).toEqual([]);
      expect(registry.heartbeat('inv-a')).toBe(true);
      expect(registry.getInstances('inventory', { healthyOnly: true })).toHaveLength(1);
      expect(registry.heartbeat('missing')).toBe(false);
    });

    it('should evict dynamic instances past the TTL only', () => {
      registry.register({ id: 'fresh', service: 'inventory', host: 'a', port: 1 });
      registry.register({ id: 'stale', service: 'inventory', host: 'b', port: 2 });
      registry.register({ id: 'pinned', service: 'inventory', host: 'c', port: 3, static: true });

      clock += 3000;
      registry.heartbeat('fresh');
      clock += 2001;

      expect(registry.evictExpired()).toEqual(['stale']);
      expect(registry.getInstances('inventory').map((instance) => instance.id)).toEqual(['fresh', 'pinned']);
    });

    it('should put a static instance back into rotation after the TTL', () => {
      registry = ServiceRegistry.fromConfig('inventory=a:1,b:2', { ttlMs: 5000, now: () => clock });
      const recovered = vi.fn();
      registry.on('recovered', recovered);
      registry.markUnhealthy('inventory-1');

      expect(registry.evictExpired(clock + 5000)).toEqual([]);
      expect(registry.resolveAddress('inventory')).toBe('b:2');

      expect(registry.evictExpired(clock + 5001)).toEqual([]);
      expect(recovered).toHaveBeenCalledWith(expect.objectContaining({ id: 'inventory-1', healthy: true }));
      expect(new Set([1, 2, 3, 4].map(() => registry.resolveAddress('inventory')))).toEqual(new Set(['a:1', 'b:2']));
    });

    it('should keep an instance exactly at the TTL', () => {
      registry.register({ id: 'edge', service: 'inventory', host: 'a', port: 1 });

      expect(registry.evictExpired(clock + 5000)).toEqual([]);
      expect(registry.evictExpired(clock + 5001)).toEqual(['edge']);
    });
  });
});
