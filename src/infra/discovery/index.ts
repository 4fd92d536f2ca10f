export { ServiceRegistry } from './ServiceRegistry.js';
export type {
  ServiceInstance,
  RegisteredInstance,
  ServiceRegistryOptions,
  GetInstancesOptions,
} from './ServiceRegistry.js';
