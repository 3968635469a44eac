/**
 * Types for Monitors
 */

import type { Decimal } from 'decimal.js';
import type { Order } from '../orders/Order.js';
import type { CompletionCheckResult } from '../deals/types.js';

// ===========================================
// Polling
// ===========================================

export interface MonitorStatus {
  name: string;
  running: boolean;
  ticks: number;
  errors: number;
  lastTickAt: number | null;
}

// ===========================================
// Staleness
// ===========================================

export interface StalenessContext {
  now: number;
  /** Last traded price, null when unavailable */
  marketPrice: Decimal | null;
}

export interface StalenessReason {
  kind: 'age' | 'price_deviation';
  detail: string;
}

export interface StalenessPredicate {
  readonly name: string;
  readonly needsMarketPrice: boolean;
  evaluate(order: Order, context: StalenessContext): StalenessReason | null;
}

export interface StaleOrder {
  order: Order;
  reasons: StalenessReason[];
  marketPrice: Decimal | null;
}

// ===========================================
// Remediation
// ===========================================

export type RemediationOutcome =
  | 'deferred'
  | 'already_final'
  | 'cancel_failed'
  | 'canceled'
  | 'deal_canceled'
  | 'recreated'
  | 'recreation_failed';

export interface RemediationResult {
  outcome: RemediationOutcome;
  order: Order;
  replacement: Order | null;
  detail: string;
}

// ===========================================
// Configuration
// ===========================================

export interface BuyOrderMonitorConfig {
  enabled: boolean;
  checkIntervalMs: number;
  /** Orders younger than this are never touched */
  gracePeriodMs: number;
  /** Minimum interval between "nothing stale" summaries */
  summaryIntervalMs: number;
}

export interface OrderTimeoutConfig {
  maxRecreationsPerDeal: number;
  minMinutesBetweenRecreations: number;
  /** Replacement price = market price * factor */
  repriceFactor: number;
}

export interface IntervalMonitorConfig {
  enabled: boolean;
  intervalMs: number;
}

// ===========================================
// Tick results & events
// ===========================================

export interface BuyMonitorTickResult {
  checked: number;
  skippedGracePeriod: number;
  stale: number;
  remediations: RemediationResult[];
}

export interface SyncResult {
  checked: number;
  updated: number;
}

export interface BuyOrderMonitorEvents {
  staleOrderDetected: [StaleOrder];
  orderRemediated: [RemediationResult];
}

export interface OrderSyncMonitorEvents {
  syncCompleted: [SyncResult];
}

export interface DealCompletionMonitorEvents {
  completionChecked: [CompletionCheckResult];
}
