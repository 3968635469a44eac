/**
 * Monitoring Module
 */

export { PollingLoop } from './PollingLoop.js';
export { StalenessPolicy } from './StalenessPolicy.js';
export { OrderTimeoutService } from './OrderTimeoutService.js';
export { BuyOrderMonitor } from './BuyOrderMonitor.js';
export { OrderSyncMonitor } from './OrderSyncMonitor.js';
export { DealCompletionMonitor } from './DealCompletionMonitor.js';
export type {
  MonitorStatus,
  StalenessContext,
  StalenessReason,
  StalenessPredicate,
  StaleOrder,
  RemediationOutcome,
  RemediationResult,
  BuyOrderMonitorConfig,
  OrderTimeoutConfig,
  IntervalMonitorConfig,
  BuyMonitorTickResult,
  SyncResult,
} from './types.js';
