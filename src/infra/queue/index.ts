/**
 * Queue Module Exports
 */
export { QueueConnection, type QueueConnectionOptions } from './QueueConnection.js';
export {
  QueueHealthService,
  QueueConnectionStatus,
  type QueueOverallStatus,
} from './QueueHealthService.js';
export {
  BasePublisher,
  type ConfirmChannelProvider,
  type ConfirmPublishChannel,
  type PublisherOptions,
  type PublishOptions,
  type PublishResult,
  type PublisherStats,
} from './publishers/BasePublisher.js';
export { RabbitEventPublisher } from './publishers/RabbitEventPublisher.js';
export { InMemoryEventPublisher } from './publishers/InMemoryEventPublisher.js';
