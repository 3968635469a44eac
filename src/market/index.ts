/**
 * Market Module
 */

export { CurrencyPairRegistry } from './CurrencyPairRegistry.js';
export type {
  MarketInfo,
  PairTradingSettings,
  CurrencyPair,
  CurrencyPairRegistryConfig,
} from './types.js';
