/**
 * Types for Order Execution Service
 */

import type { Decimal } from 'decimal.js';
import type { ErrorCode } from '../errors.js';
import type { Order } from '../orders/Order.js';
import type { CancelResult } from '../orders/types.js';

// ===========================================
// Validation
// ===========================================

/**
 * Strategy result after shape and constraint validation
 */
export interface ValidatedStrategy {
  buyPrice: Decimal;
  coinsToBuy: Decimal;
  sellPrice: Decimal;
  coinsToSell: Decimal;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  strategy: ValidatedStrategy | null;
}

// ===========================================
// Execution
// ===========================================

export interface ExecutionReport {
  success: boolean;
  symbol: string;
  dealId: string | null;
  buyOrder: Order | null;
  sellOrder: Order | null;
  error: string | null;
  errorCode: ErrorCode | null;
  /** Set when a placed BUY had to be rolled back */
  emergencyCancel: CancelResult | null;
  durationMs: number;
}

export interface ExecutionStatistics {
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  /** Quote value of placed BUY orders */
  totalVolume: string;
  /** Estimated fees of placed BUY orders */
  totalFees: string;
  averageExecutionTimeMs: number;
  successRate: number;
}

export interface EmergencyStopReport {
  ordersCanceled: number;
  ordersFailed: number;
  dealsCanceled: number;
}

export type ExecutionEvents = {
  executionCompleted: [ExecutionReport];
  executionFailed: [ExecutionReport];
  emergencyCancel: [Order, CancelResult];
};
