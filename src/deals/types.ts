/**
 * Deal Types
 */

import type { Decimal } from 'decimal.js';
import type { Deal } from './Deal.js';
import type { Order } from '../orders/Order.js';

export type DealStatus = 'OPEN' | 'CLOSED' | 'CANCELED';

/**
 * Serialized deal; orders are referenced by id
 */
export interface DealRecord {
  id: string;
  symbol: string;
  status: DealStatus;
  buy_order_id: string | null;
  sell_order_id: string | null;
  profit: string | null;
  created_at: number;
  updated_at: number;
  closed_at: number | null;
  recreation_count: number;
  last_recreated_at: number | null;
}

export interface BalanceCheckOutcome {
  ok: boolean;
  currency: string;
  available: Decimal;
  required: Decimal;
  error: string | null;
}

export interface CompletionCheckResult {
  /** SELL orders sent to the exchange during this check */
  sellsPlaced: number;
  dealsClosed: number;
  errors: number;
}

export interface DealStatistics {
  total: number;
  open: number;
  closed: number;
  canceled: number;
  /** Sum of realized profit over closed deals, quote currency */
  realizedProfit: string;
}

export interface DealServiceEvents {
  dealCreated: [Deal];
  dealClosed: [Deal];
  dealCanceled: [Deal, string];
  buyOrderReplaced: [Deal, Order, Order];
  sellOrderPlaced: [Deal, Order];
}
