/**
 * Types for Strategy Engine
 */

import type { Decimal } from 'decimal.js';
import type { DecimalInput } from '../utils/decimal.js';
import type { ExecutionReport } from '../execution/types.js';

// ===========================================
// Calculator
// ===========================================

/**
 * Sizing inputs; fees and profit in percent (0.1 = 0.1%)
 */
export interface CalculatorInput {
  buyPrice: DecimalInput;
  budget: DecimalInput;
  /** Quantity lot size */
  minStep: DecimalInput;
  /** Price tick size */
  priceStep: DecimalInput;
  buyFeePercent: DecimalInput;
  sellFeePercent: DecimalInput;
  profitPercent: DecimalInput;
  minNotional?: DecimalInput | null;
  minQty?: DecimalInput | null;
  maxQty?: DecimalInput | null;
}

export interface StrategyInfo {
  buyPriceWithFee: Decimal;
  totalCost: Decimal;
  netProfit: Decimal;
  minProfit: Decimal;
}

export interface StrategyResult {
  buyPrice: Decimal;
  coinsToBuy: Decimal;
  sellPrice: Decimal;
  /** Coins left to sell once the sell fee is taken */
  coinsToSell: Decimal;
  info: StrategyInfo;
}

/** Positional form accepted at the signal boundary */
export type StrategyTuple = [
  buyPrice: DecimalInput,
  coinsToBuy: DecimalInput,
  sellPrice: DecimalInput,
  coinsToSell: DecimalInput,
  info: unknown,
];

export type CalculationOutcome =
  | { ok: true; result: StrategyResult }
  | { ok: false; reason: string };

// ===========================================
// Engine
// ===========================================

/**
 * A trade decision from the signal producer
 */
export interface TradeDecision {
  symbol: string;
  buyPrice: DecimalInput;
  /** Defaults to the pair's deal quota */
  budget?: DecimalInput;
}

export interface DecisionOutcome {
  accepted: boolean;
  reason: string | null;
  result: StrategyResult | null;
  report: ExecutionReport | null;
}

export interface StrategyEngineEvents {
  strategyCalculated: [string, StrategyResult];
  strategyRejected: [string, string];
  error: [Error];
}
