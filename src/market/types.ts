/**
 * Market Types
 */

import type { Decimal } from 'decimal.js';

/**
 * Exchange-side metadata of one symbol
 */
export interface MarketInfo {
  symbol: string;
  baseCurrency: string;
  quoteCurrency: string;

  /** Lot size: quantities must be multiples of this */
  amountStep: Decimal;
  /** Tick size: prices must be multiples of this */
  priceStep: Decimal;

  minQty: Decimal;
  maxQty: Decimal | null;
  minPrice: Decimal | null;
  maxPrice: Decimal | null;
  minNotional: Decimal;

  /** Fees in percent (0.1 = 0.1%) */
  makerFeePercent: Decimal;
  takerFeePercent: Decimal;
}

/**
 * Per-pair trading parameters
 */
export interface PairTradingSettings {
  /** Budget per deal in quote currency */
  dealQuota: Decimal;
  profitMarkupPercent: Decimal;
  maxOpenDeals: number;
}

export interface CurrencyPair extends MarketInfo, PairTradingSettings {}

export interface CurrencyPairRegistryConfig {
  /** How long loaded metadata is reused */
  ttlMs: number;
  defaults: PairTradingSettings;
  /** Optional per-symbol overrides */
  overrides?: Record<string, Partial<PairTradingSettings>>;
}
