/**
 * Deals Module
 */

export { Deal } from './Deal.js';
export type { DealProps } from './Deal.js';
export { DealFactory } from './DealFactory.js';
export { DealService } from './DealService.js';
export type {
  DealStatus,
  DealRecord,
  BalanceCheckOutcome,
  CompletionCheckResult,
  DealStatistics,
  DealServiceEvents,
} from './types.js';
