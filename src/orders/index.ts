/**
 * Orders Module
 */

export { Order } from './Order.js';
export type { OrderProps } from './Order.js';
export { OrderFactory } from './OrderFactory.js';
export type { NewOrderParams } from './OrderFactory.js';
export { OrderService } from './OrderService.js';
export { TERMINAL_ORDER_STATUSES } from './types.js';
export type {
  OrderSide,
  OrderType,
  OrderStatus,
  OrderRecord,
  ExecutionResult,
  CancelOutcome,
  CancelResult,
  OrderPlacementRequest,
  OrderServiceConfig,
  OrderStatistics,
  OrderServiceEvents,
} from './types.js';
