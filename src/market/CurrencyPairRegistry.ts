/**
 * Currency Pair Registry
 *
 * Loads symbol metadata from the exchange and keeps it for a freshness
 * window. The execution engine only ever reads pairs from here.
 */

import { logger } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { ExchangeGateway } from '../exchange/types.js';
import type { CurrencyPair, CurrencyPairRegistryConfig } from './types.js';

interface CacheEntry {
  pair: CurrencyPair;
  loadedAt: number;
}

export class CurrencyPairRegistry {
  private readonly config: CurrencyPairRegistryConfig;
  private readonly gateway: ExchangeGateway;
  private readonly clock: Clock;
  private readonly cache: Map<string, CacheEntry> = new Map();
  private readonly inflight: Map<string, Promise<CurrencyPair>> = new Map();

  constructor(
    config: CurrencyPairRegistryConfig,
    gateway: ExchangeGateway,
    clock: Clock = systemClock
  ) {
    this.config = config;
    this.gateway = gateway;
    this.clock = clock;
  }

  /**
   * Get pair metadata, refreshing it when the cached copy expired
   */
  async getPair(symbol: string): Promise<CurrencyPair> {
    const key = symbol.toUpperCase();
    const cached = this.cache.get(key);
    if (cached && this.clock() - cached.loadedAt < this.config.ttlMs) {
      return cached.pair;
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const load = this.load(key).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, load);
    return load;
  }

  /**
   * Cached pair regardless of age, without touching the exchange
   */
  getCached(symbol: string): CurrencyPair | undefined {
    return this.cache.get(symbol.toUpperCase())?.pair;
  }

  listCached(): CurrencyPair[] {
    return Array.from(this.cache.values(), (entry) => entry.pair);
  }

  invalidate(symbol?: string): void {
    if (symbol) {
      this.cache.delete(symbol.toUpperCase());
    } else {
      this.cache.clear();
    }
  }

  private async load(symbol: string): Promise<CurrencyPair> {
    const market = await this.gateway.fetchMarket(symbol);
    const pair: CurrencyPair = {
      ...market,
      ...this.config.defaults,
      ...this.config.overrides?.[symbol],
    };

    this.cache.set(symbol, { pair, loadedAt: this.clock() });
    logger.debug('Currency pair loaded', {
      symbol,
      amountStep: pair.amountStep.toString(),
      priceStep: pair.priceStep.toString(),
      minNotional: pair.minNotional.toString(),
    });
    return pair;
  }
}
