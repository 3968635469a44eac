/**
 * Shared test fixtures
 */

import { Decimal } from 'decimal.js';
import type { Clock } from '../src/utils/clock.js';
import type { CurrencyPair, MarketInfo } from '../src/market/types.js';
import { PaperExchangeGateway } from '../src/exchange/PaperExchangeGateway.js';
import { InMemoryDealRepository } from '../src/persistence/InMemoryDealRepository.js';
import { InMemoryOrderRepository } from '../src/persistence/InMemoryOrderRepository.js';
import { OrderFactory } from '../src/orders/OrderFactory.js';
import { OrderService } from '../src/orders/OrderService.js';
import { DealFactory } from '../src/deals/DealFactory.js';
import { DealService } from '../src/deals/DealService.js';
import { OrderExecutionService } from '../src/execution/OrderExecutionService.js';

export const START_TIME = 1_700_000_000_000;
export const MINUTE = 60_000;

export interface ManualClock {
  clock: Clock;
  advance(ms: number): void;
  now(): number;
}

export function manualClock(start: number = START_TIME): ManualClock {
  let current = start;
  return {
    clock: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    now: () => current,
  };
}

export function sequentialIds(prefix: string): () => string {
  let next = 1;
  return () => `${prefix}-${next++}`;
}

export function ethMarket(overrides: Partial<MarketInfo> = {}): MarketInfo {
  return {
    symbol: 'ETHUSDT',
    baseCurrency: 'ETH',
    quoteCurrency: 'USDT',
    amountStep: new Decimal('0.0001'),
    priceStep: new Decimal('0.01'),
    minQty: new Decimal('0.0001'),
    maxQty: new Decimal('9000'),
    minPrice: null,
    maxPrice: null,
    minNotional: new Decimal('5'),
    makerFeePercent: new Decimal('0.1'),
    takerFeePercent: new Decimal('0.1'),
    ...overrides,
  };
}

export function ethPair(overrides: Partial<CurrencyPair> = {}): CurrencyPair {
  return {
    ...ethMarket(),
    dealQuota: new Decimal(100),
    profitMarkupPercent: new Decimal(1),
    maxOpenDeals: 1,
    ...overrides,
  };
}

export interface Engine {
  time: ManualClock;
  gateway: PaperExchangeGateway;
  orders: InMemoryOrderRepository;
  deals: InMemoryDealRepository;
  orderService: OrderService;
  dealService: DealService;
  executionService: OrderExecutionService;
  pair: CurrencyPair;
}

/**
 * Services wired against a seeded paper exchange (ETHUSDT at 3000,
 * 10000 USDT), no retry delay
 */
export function createEngine(): Engine {
  const time = manualClock();
  const gateway = new PaperExchangeGateway(time.clock);
  gateway.addMarket(ethMarket(), '3000');
  gateway.setBalance('USDT', '10000');

  const orders = new InMemoryOrderRepository();
  const deals = new InMemoryDealRepository();
  const orderService = new OrderService(
    { retryAttempts: 3, retryBaseDelayMs: 0, retryBackoffFactor: 2 },
    gateway,
    orders,
    new OrderFactory(time.clock, sequentialIds('order')),
    time.clock
  );
  const dealService = new DealService(
    gateway,
    deals,
    orders,
    orderService,
    new DealFactory(time.clock, sequentialIds('deal')),
    time.clock
  );
  const executionService = new OrderExecutionService(orderService, dealService, time.clock);

  return { time, gateway, orders, deals, orderService, dealService, executionService, pair: ethPair() };
}

/** Strategy result of the 100 USDT / 3000 scenario */
export function scenarioStrategy(): {
  buyPrice: Decimal;
  coinsToBuy: Decimal;
  sellPrice: Decimal;
  coinsToSell: Decimal;
} {
  return {
    buyPrice: new Decimal('3000'),
    coinsToBuy: new Decimal('0.0332'),
    sellPrice: new Decimal('3030'),
    coinsToSell: new Decimal('0.0332'),
  };
}
