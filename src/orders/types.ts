/**
 * Order Types
 */

import type { Decimal } from 'decimal.js';
import type { Order } from './Order.js';

// ============================================================================
// Order State
// ============================================================================

export type OrderSide = 'BUY' | 'SELL';

export type OrderType = 'LIMIT' | 'MARKET';

export type OrderStatus =
  | 'PENDING'
  | 'OPEN'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'FAILED';

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = ['FILLED', 'CANCELED', 'FAILED'];

/**
 * Serialized order, decimals as strings
 */
export interface OrderRecord {
  id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  price: string;
  amount: string;
  filled_amount: string;
  average_price: string | null;
  fees: string;
  status: OrderStatus;
  exchange_id: string | null;
  deal_id: string | null;
  created_at: number;
  updated_at: number;
  closed_at: number | null;
  last_snapshot_at: number | null;
  retries: number;
  error_message: string | null;
}

// ============================================================================
// Service Results
// ============================================================================

export interface ExecutionResult {
  success: boolean;
  /** Null only when validation rejected the request before an order existed */
  order: Order | null;
  error: string | null;
}

export type CancelOutcome = 'canceled' | 'already_final' | 'failed';

export interface CancelResult {
  success: boolean;
  outcome: CancelOutcome;
  order: Order;
  error: string | null;
}

export interface OrderPlacementRequest {
  symbol: string;
  amount: Decimal.Value;
  price: Decimal.Value;
  dealId: string | null;
  type?: OrderType;
}

export interface OrderServiceConfig {
  retryAttempts: number;
  retryBaseDelayMs: number;
  retryBackoffFactor: number;
}

export interface OrderStatistics {
  total: number;
  byStatus: Record<OrderStatus, number>;
  placementAttempts: number;
  placementFailures: number;
}

// ============================================================================
// Events
// ============================================================================

export interface OrderServiceEvents {
  orderPlaced: [Order];
  orderFailed: [Order, string];
  orderCanceled: [Order, string];
  orderUpdated: [Order];
}
