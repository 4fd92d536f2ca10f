/**
 * Ports for external systems. Infrastructure supplies the adapters.
 */
export type { IInventoryProvider, StockLevel } from './InventoryProvider.js';
export type { IEventPublisher, ProductEvent, ProductEventType } from './EventPublisher.js';
