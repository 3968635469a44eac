/**
 * Paper Exchange Gateway
 *
 * In-process simulated exchange for dry runs and tests. Limit orders rest
 * until the price crosses them (or fillOrder() is called); market orders
 * fill immediately at the last price. Funds are locked while an order rests.
 */

import { Decimal } from 'decimal.js';
import { ExchangeError } from '../errors.js';
import { logger } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { MarketInfo } from '../market/types.js';
import type {
  BalanceCheckRequest,
  BalanceCheckResult,
  CreateOrderRequest,
  ExchangeGateway,
  ExchangeOrderStatus,
  OrderSnapshot,
} from './types.js';

interface PaperOrder {
  exchangeId: string;
  symbol: string;
  side: CreateOrderRequest['side'];
  type: CreateOrderRequest['type'];
  status: ExchangeOrderStatus;
  price: Decimal;
  amount: Decimal;
  filled: Decimal;
  quoteFilled: Decimal;
  fee: Decimal;
  timestamp: number;
}

interface Balance {
  free: Decimal;
  locked: Decimal;
}

type FailableOperation = 'createOrder' | 'cancelOrder' | 'fetchOrder' | 'fetchTicker';

export interface PaperExchangeOptions {
  /** Fill resting limit orders when setPrice() crosses them */
  matchOnPriceUpdate?: boolean;
}

export class PaperExchangeGateway implements ExchangeGateway {
  readonly name = 'paper';

  private readonly clock: Clock;
  private readonly matchOnPriceUpdate: boolean;
  private readonly markets: Map<string, MarketInfo> = new Map();
  private readonly prices: Map<string, Decimal> = new Map();
  private readonly balances: Map<string, Balance> = new Map();
  private readonly orders: Map<string, PaperOrder> = new Map();
  private readonly failures: Map<FailableOperation, ExchangeError[]> = new Map();
  private nextOrderId = 1;
  private lastTimestamp = 0;

  constructor(clock: Clock = systemClock, options: PaperExchangeOptions = {}) {
    this.clock = clock;
    this.matchOnPriceUpdate = options.matchOnPriceUpdate ?? true;
  }

  // ==========================================================================
  // Simulation controls
  // ==========================================================================

  addMarket(market: MarketInfo, price?: Decimal.Value): void {
    this.markets.set(market.symbol, market);
    if (price !== undefined) {
      this.prices.set(market.symbol, new Decimal(price));
    }
  }

  setBalance(currency: string, amount: Decimal.Value): void {
    const balance = this.getBalanceEntry(currency);
    balance.free = new Decimal(amount);
  }

  getBalance(currency: string): { free: Decimal; locked: Decimal } {
    const balance = this.getBalanceEntry(currency);
    return { free: balance.free, locked: balance.locked };
  }

  setPrice(symbol: string, price: Decimal.Value): void {
    const last = new Decimal(price);
    this.prices.set(symbol, last);
    if (!this.matchOnPriceUpdate) return;

    for (const order of this.orders.values()) {
      if (order.symbol !== symbol || order.status !== 'open') continue;
      const crossed = order.side === 'BUY' ? last.lte(order.price) : last.gte(order.price);
      if (crossed) {
        this.executeFill(order, order.amount.minus(order.filled), order.price);
      }
    }
  }

  /**
   * Fill a resting order, fully or by `amount`
   */
  fillOrder(exchangeId: string, amount?: Decimal.Value): OrderSnapshot {
    const order = this.requireOrder(exchangeId);
    if (order.status !== 'open') {
      throw new ExchangeError('rejected', `Order ${exchangeId} is not open`);
    }
    const remaining = order.amount.minus(order.filled);
    const quantity = amount === undefined ? remaining : Decimal.min(new Decimal(amount), remaining);
    this.executeFill(order, quantity, order.price);
    return this.toSnapshot(order);
  }

  /**
   * Mark an order canceled or expired from the exchange side
   */
  expireOrder(exchangeId: string, status: 'canceled' | 'expired' = 'expired'): void {
    const order = this.requireOrder(exchangeId);
    if (order.status !== 'open') return;
    this.releaseLocked(order);
    order.status = status;
    order.timestamp = this.tick();
  }

  /**
   * Make the next `count` calls of an operation throw
   */
  failNext(
    operation: FailableOperation,
    count = 1,
    error: ExchangeError = new ExchangeError('network', `Simulated ${operation} failure`)
  ): void {
    const queue = this.failures.get(operation) ?? [];
    for (let i = 0; i < count; i++) {
      queue.push(error);
    }
    this.failures.set(operation, queue);
  }

  listOrders(): OrderSnapshot[] {
    return Array.from(this.orders.values(), (order) => this.toSnapshot(order));
  }

  // ==========================================================================
  // ExchangeGateway
  // ==========================================================================

  async verifyConnection(): Promise<boolean> {
    return true;
  }

  async createOrder(request: CreateOrderRequest): Promise<OrderSnapshot> {
    this.maybeFail('createOrder');
    const market = this.requireMarket(request.symbol);

    if (request.amount.lte(0)) {
      throw new ExchangeError('rejected', 'Order quantity must be positive', -1013);
    }
    if (!request.amount.mod(market.amountStep).isZero()) {
      throw new ExchangeError('rejected', 'Filter failure: LOT_SIZE', -1013);
    }

    const lastPrice = this.prices.get(request.symbol);
    const price = request.type === 'MARKET' ? lastPrice : request.price;
    if (price === undefined || price.lte(0)) {
      throw new ExchangeError('rejected', `No price available for ${request.symbol}`, -1013);
    }
    if (request.type === 'LIMIT' && !price.mod(market.priceStep).isZero()) {
      throw new ExchangeError('rejected', 'Filter failure: PRICE_FILTER', -1013);
    }

    this.lockFunds(market, request.side, request.amount, price);

    const order: PaperOrder = {
      exchangeId: String(this.nextOrderId++),
      symbol: request.symbol,
      side: request.side,
      type: request.type,
      status: 'open',
      price,
      amount: request.amount,
      filled: new Decimal(0),
      quoteFilled: new Decimal(0),
      fee: new Decimal(0),
      timestamp: this.tick(),
    };
    this.orders.set(order.exchangeId, order);

    if (request.type === 'MARKET') {
      this.executeFill(order, order.amount, price);
    }

    logger.debug('Paper order created', {
      exchangeId: order.exchangeId,
      symbol: order.symbol,
      side: order.side,
      price: order.price.toString(),
      amount: order.amount.toString(),
    });
    return this.toSnapshot(order);
  }

  async cancelOrder(exchangeId: string, symbol: string): Promise<OrderSnapshot> {
    this.maybeFail('cancelOrder');
    const order = this.requireOrder(exchangeId, symbol);
    if (order.status !== 'open') {
      throw new ExchangeError('not_found', 'Unknown order sent.', -2011);
    }
    this.releaseLocked(order);
    order.status = 'canceled';
    order.timestamp = this.tick();
    return this.toSnapshot(order);
  }

  async fetchOrder(exchangeId: string, symbol: string): Promise<OrderSnapshot> {
    this.maybeFail('fetchOrder');
    return this.toSnapshot(this.requireOrder(exchangeId, symbol));
  }

  async fetchTicker(symbol: string): Promise<Decimal> {
    this.maybeFail('fetchTicker');
    const price = this.prices.get(symbol);
    if (price === undefined) {
      throw new ExchangeError('not_found', `No ticker for ${symbol}`, -1121);
    }
    return price;
  }

  async checkSufficientBalance(request: BalanceCheckRequest): Promise<BalanceCheckResult> {
    const market = this.requireMarket(request.symbol);
    const currency = request.side === 'BUY' ? market.quoteCurrency : market.baseCurrency;
    const required =
      request.side === 'BUY' ? request.amount.mul(request.price) : request.amount;
    const available = this.getBalanceEntry(currency).free;
    return { ok: available.gte(required), currency, available, required };
  }

  async fetchMarket(symbol: string): Promise<MarketInfo> {
    return this.requireMarket(symbol);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /** Strictly increasing exchange time */
  private tick(): number {
    this.lastTimestamp = Math.max(this.clock(), this.lastTimestamp + 1);
    return this.lastTimestamp;
  }

  private maybeFail(operation: FailableOperation): void {
    const error = this.failures.get(operation)?.shift();
    if (error) {
      throw error;
    }
  }

  private requireMarket(symbol: string): MarketInfo {
    const market = this.markets.get(symbol);
    if (!market) {
      throw new ExchangeError('rejected', `Invalid symbol ${symbol}`, -1121);
    }
    return market;
  }

  private requireOrder(exchangeId: string, symbol?: string): PaperOrder {
    const order = this.orders.get(exchangeId);
    if (!order || (symbol !== undefined && order.symbol !== symbol)) {
      throw new ExchangeError('not_found', 'Order does not exist.', -2013);
    }
    return order;
  }

  private getBalanceEntry(currency: string): Balance {
    let balance = this.balances.get(currency);
    if (!balance) {
      balance = { free: new Decimal(0), locked: new Decimal(0) };
      this.balances.set(currency, balance);
    }
    return balance;
  }

  private lockFunds(market: MarketInfo, side: PaperOrder['side'], amount: Decimal, price: Decimal): void {
    const currency = side === 'BUY' ? market.quoteCurrency : market.baseCurrency;
    const required = side === 'BUY' ? amount.mul(price) : amount;
    const balance = this.getBalanceEntry(currency);
    if (balance.free.lt(required)) {
      throw new ExchangeError(
        'rejected',
        'Account has insufficient balance for requested action.',
        -2010
      );
    }
    balance.free = balance.free.minus(required);
    balance.locked = balance.locked.plus(required);
  }

  private releaseLocked(order: PaperOrder): void {
    const market = this.requireMarket(order.symbol);
    const remaining = order.amount.minus(order.filled);
    if (order.side === 'BUY') {
      const quote = this.getBalanceEntry(market.quoteCurrency);
      const release = remaining.mul(order.price);
      quote.locked = quote.locked.minus(release);
      quote.free = quote.free.plus(release);
    } else {
      const base = this.getBalanceEntry(market.baseCurrency);
      base.locked = base.locked.minus(remaining);
      base.free = base.free.plus(remaining);
    }
  }

  private executeFill(order: PaperOrder, quantity: Decimal, price: Decimal): void {
    if (quantity.lte(0)) return;
    const market = this.requireMarket(order.symbol);
    const quote = this.getBalanceEntry(market.quoteCurrency);
    const base = this.getBalanceEntry(market.baseCurrency);
    const value = quantity.mul(price);
    const fee = value.mul(market.takerFeePercent).div(100);

    if (order.side === 'BUY') {
      quote.locked = quote.locked.minus(quantity.mul(order.price));
      quote.free = quote.free.plus(quantity.mul(order.price)).minus(value).minus(fee);
      base.free = base.free.plus(quantity);
    } else {
      base.locked = base.locked.minus(quantity);
      quote.free = quote.free.plus(value).minus(fee);
    }

    order.filled = order.filled.plus(quantity);
    order.quoteFilled = order.quoteFilled.plus(value);
    order.fee = order.fee.plus(fee);
    if (order.filled.gte(order.amount)) {
      order.status = 'closed';
    }
    order.timestamp = this.tick();
  }

  private toSnapshot(order: PaperOrder): OrderSnapshot {
    return {
      exchangeId: order.exchangeId,
      symbol: order.symbol,
      side: order.side,
      type: order.type,
      status: order.status,
      price: order.price,
      amount: order.amount,
      filled: order.filled,
      averagePrice: order.filled.gt(0) ? order.quoteFilled.div(order.filled) : null,
      fee: order.fee,
      timestamp: order.timestamp,
    };
  }
}
