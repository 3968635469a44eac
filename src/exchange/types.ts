/**
 * Exchange Boundary Types
 *
 * Every adapter normalizes its responses into these structures so that
 * nothing downstream branches on response shape.
 */

import type { Decimal } from 'decimal.js';
import type { MarketInfo } from '../market/types.js';
import type { OrderSide, OrderType } from '../orders/types.js';

// ============================================================================
// Order Snapshots
// ============================================================================

export type ExchangeOrderStatus = 'open' | 'closed' | 'canceled' | 'expired' | 'rejected';

/**
 * Canonical exchange-side view of one order
 */
export interface OrderSnapshot {
  exchangeId: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  status: ExchangeOrderStatus;
  price: Decimal;
  amount: Decimal;
  filled: Decimal;
  averagePrice: Decimal | null;
  /** Fee in quote currency, null when the exchange does not report it */
  fee: Decimal | null;
  /** Exchange-side time of this state (ms) */
  timestamp: number;
}

// ============================================================================
// Requests
// ============================================================================

export interface CreateOrderRequest {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  amount: Decimal;
  /** Ignored for MARKET orders */
  price: Decimal;
  /** Local order id, forwarded as client order id where supported */
  clientOrderId?: string;
}

export interface BalanceCheckRequest {
  symbol: string;
  side: OrderSide;
  amount: Decimal;
  price: Decimal;
}

export interface BalanceCheckResult {
  ok: boolean;
  currency: string;
  available: Decimal;
  required: Decimal;
}

// ============================================================================
// Gateway
// ============================================================================

export interface ExchangeGateway {
  readonly name: string;

  /** Check credentials and connectivity */
  verifyConnection(): Promise<boolean>;

  createOrder(request: CreateOrderRequest): Promise<OrderSnapshot>;
  cancelOrder(exchangeId: string, symbol: string): Promise<OrderSnapshot>;
  fetchOrder(exchangeId: string, symbol: string): Promise<OrderSnapshot>;

  /** Last traded price */
  fetchTicker(symbol: string): Promise<Decimal>;

  checkSufficientBalance(request: BalanceCheckRequest): Promise<BalanceCheckResult>;
  fetchMarket(symbol: string): Promise<MarketInfo>;
}
