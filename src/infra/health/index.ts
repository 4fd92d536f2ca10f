export {
  HealthService,
  aggregateStatus,
  type ComponentHealth,
  type ComponentStatus,
  type OverallStatus,
  type HealthCheck,
  type HealthCheckResult,
  type HealthServiceOptions,
  type ReadinessResult,
} from './HealthService.js';
export { pingCheck, notConfiguredCheck, queueCheck, downstreamCheck } from './checks.js';
