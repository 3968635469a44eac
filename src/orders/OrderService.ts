/**
 * Order Service
 *
 * Places, cancels and queries individual orders through the exchange
 * gateway. Placement retries with exponential backoff; every attempt is
 * counted on the order. Nothing thrown by the gateway escapes: callers get
 * ExecutionResult / CancelResult objects.
 */

import EventEmitter from 'eventemitter3';
import { Decimal } from 'decimal.js';
import { OrderStateError, ValidationError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { retryWithBackoff } from '../utils/retry.js';
import type { ExchangeGateway, OrderSnapshot } from '../exchange/types.js';
import type { OrderRepository } from '../persistence/types.js';
import { OrderFactory } from './OrderFactory.js';
import type { Order } from './Order.js';
import type {
  CancelResult,
  ExecutionResult,
  OrderPlacementRequest,
  OrderServiceConfig,
  OrderServiceEvents,
  OrderSide,
  OrderStatistics,
  OrderStatus,
} from './types.js';

export class OrderService extends EventEmitter<OrderServiceEvents> {
  private readonly config: OrderServiceConfig;
  private readonly gateway: ExchangeGateway;
  private readonly orders: OrderRepository;
  private readonly factory: OrderFactory;
  private readonly clock: Clock;
  private placementAttempts = 0;
  private placementFailures = 0;

  constructor(
    config: OrderServiceConfig,
    gateway: ExchangeGateway,
    orders: OrderRepository,
    factory: OrderFactory = new OrderFactory(),
    clock: Clock = systemClock
  ) {
    super();
    this.config = config;
    this.gateway = gateway;
    this.orders = orders;
    this.factory = factory;
    this.clock = clock;

    logger.info('Order Service initialized', {
      exchange: gateway.name,
      retryAttempts: config.retryAttempts,
      retryBaseDelayMs: config.retryBaseDelayMs,
      retryBackoffFactor: config.retryBackoffFactor,
    });
  }

  // ==========================================================================
  // Placement
  // ==========================================================================

  createAndPlaceBuyOrder(request: OrderPlacementRequest): Promise<ExecutionResult> {
    return this.createAndPlace('BUY', request);
  }

  createAndPlaceSellOrder(request: OrderPlacementRequest): Promise<ExecutionResult> {
    return this.createAndPlace('SELL', request);
  }

  /**
   * Record a PENDING SELL without contacting the exchange
   */
  createLocalSellOrder(request: OrderPlacementRequest): ExecutionResult {
    try {
      const order = this.buildOrder('SELL', request);
      this.orders.save(order);
      logger.debug('Local SELL order recorded', {
        orderId: order.id,
        dealId: order.dealId,
        price: order.price.toString(),
        amount: order.amount.toString(),
      });
      return { success: true, order, error: null };
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('Local SELL order rejected', { symbol: request.symbol, error: message });
      return { success: false, order: null, error: message };
    }
  }

  /**
   * Send an already recorded PENDING order to the exchange
   */
  async placeExistingOrder(order: Order): Promise<ExecutionResult> {
    const latest = this.orders.getById(order.id) ?? order;
    if (!latest.isPending) {
      return {
        success: false,
        order: latest,
        error: `Order ${latest.id} is ${latest.status}, only PENDING orders can be placed`,
      };
    }
    return this.place(latest);
  }

  private async createAndPlace(
    side: OrderSide,
    request: OrderPlacementRequest
  ): Promise<ExecutionResult> {
    let order: Order;
    try {
      order = this.buildOrder(side, request);
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('Order request rejected', { side, symbol: request.symbol, error: message });
      return { success: false, order: null, error: message };
    }

    this.orders.save(order);
    return this.place(order);
  }

  private buildOrder(side: OrderSide, request: OrderPlacementRequest): Order {
    if (request.symbol.trim().length === 0) {
      throw new ValidationError('Symbol is required');
    }
    const amount = parsePositive(request.amount, 'amount');
    const type = request.type ?? 'LIMIT';
    const price =
      type === 'MARKET' ? parseNonNegative(request.price, 'price') : parsePositive(request.price, 'price');

    return this.factory.create({
      symbol: request.symbol,
      side,
      type,
      amount,
      price,
      dealId: request.dealId,
    });
  }

  private async place(order: Order): Promise<ExecutionResult> {
    const maxAttempts = this.config.retryAttempts;

    try {
      const result = await retryWithBackoff(
        async () => {
          // A local cancel may have landed between two attempts
          const current = this.orders.getById(order.id) ?? order;
          if (!current.isPending) {
            throw new OrderStateError(`Order ${order.id} is ${current.status}, placement aborted`);
          }
          order.recordAttempt(this.clock());
          this.placementAttempts += 1;
          this.orders.save(order);
          return this.gateway.createOrder({
            symbol: order.symbol,
            side: order.side,
            type: order.type,
            amount: order.amount,
            price: order.price,
            clientOrderId: order.id,
          });
        },
        {
          maxAttempts,
          baseDelayMs: this.config.retryBaseDelayMs,
          factor: this.config.retryBackoffFactor,
          onRetry: (attempt, error, delayMs) => {
            logger.warn(`Order placement failed, attempt ${attempt}/${maxAttempts}`, {
              orderId: order.id,
              side: order.side,
              symbol: order.symbol,
              retryInMs: delayMs,
              error: errorMessage(error),
            });
          },
        }
      );

      if (result.ok) {
        const current = this.orders.getById(order.id) ?? order;
        if (!current.isPending) {
          return this.withdrawLatePlacement(current, result.value);
        }

        order.markAsPlaced(result.value.exchangeId, this.clock());
        order.updateFromExchange(result.value);
        this.orders.save(order);

        logger.info('Order placed', {
          orderId: order.id,
          exchangeId: order.exchangeId,
          side: order.side,
          symbol: order.symbol,
          price: order.price.toString(),
          amount: order.amount.toString(),
          attempts: result.attempts,
        });
        this.emit('orderPlaced', order);
        return { success: true, order, error: null };
      }

      return this.failPlacement(order, errorMessage(result.error));
    } catch (error) {
      return this.failPlacement(order, errorMessage(error));
    }
  }

  /**
   * The exchange accepted an order that was canceled locally while the
   * request was in flight: keep its exchange id and cancel it there too.
   */
  private async withdrawLatePlacement(order: Order, snapshot: OrderSnapshot): Promise<ExecutionResult> {
    order.recordLateExchangeId(snapshot.exchangeId, this.clock());
    this.orders.save(order);
    logger.warn('Order accepted by exchange after local cancel, withdrawing', {
      orderId: order.id,
      exchangeId: snapshot.exchangeId,
      status: order.status,
    });

    const cancel = await retryWithBackoff(
      () => this.gateway.cancelOrder(snapshot.exchangeId, order.symbol),
      {
        maxAttempts: this.config.retryAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        factor: this.config.retryBackoffFactor,
      }
    );
    if (cancel.ok) {
      return this.failPlacement(order, `Order ${order.id} was ${order.status} before the exchange accepted it`);
    }

    const message = `Exchange order ${snapshot.exchangeId} could not be withdrawn: ${errorMessage(cancel.error)}`;
    return this.failPlacement(order, message);
  }

  private failPlacement(order: Order, message: string): ExecutionResult {
    this.placementFailures += 1;
    if (order.isPending) {
      order.markAsFailed(message, this.clock());
    } else {
      order.recordError(message, this.clock());
    }
    this.orders.save(order);

    logger.error('Order placement failed', {
      orderId: order.id,
      side: order.side,
      symbol: order.symbol,
      retries: order.retries,
      error: message,
    });
    this.emit('orderFailed', order, message);
    return { success: false, order, error: message };
  }

  // ==========================================================================
  // Status & cancel
  // ==========================================================================

  /**
   * Merge the exchange view into the latest stored order.
   * On error the order is returned unchanged.
   */
  async getOrderStatus(order: Order): Promise<Order> {
    const latest = this.orders.getById(order.id) ?? order;
    const exchangeId = latest.exchangeId;
    if (exchangeId === null || latest.isTerminal) {
      return latest;
    }

    try {
      const snapshot = await this.gateway.fetchOrder(exchangeId, latest.symbol);
      const previousStatus = latest.status;
      if (latest.updateFromExchange(snapshot)) {
        this.orders.save(latest);
        logger.debug('Order updated from exchange', {
          orderId: latest.id,
          from: previousStatus,
          to: latest.status,
          filled: latest.filledAmount.toString(),
        });
        this.emit('orderUpdated', latest);
      }
    } catch (error) {
      logger.warn('Failed to fetch order status', {
        orderId: latest.id,
        exchangeId,
        error: errorMessage(error),
      });
    }
    return latest;
  }

  async cancelOrder(order: Order, reason: string): Promise<CancelResult> {
    const latest = this.orders.getById(order.id) ?? order;
    if (latest.isTerminal) {
      return { success: true, outcome: 'already_final', order: latest, error: null };
    }

    const exchangeId = latest.exchangeId;
    if (latest.isPending || exchangeId === null) {
      return this.finishCancel(latest, reason);
    }

    const result = await retryWithBackoff(
      () => this.gateway.cancelOrder(exchangeId, latest.symbol),
      {
        maxAttempts: this.config.retryAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        factor: this.config.retryBackoffFactor,
      }
    );

    if (result.ok) {
      latest.updateFromExchange(result.value);
      if (latest.isFilled) {
        this.orders.save(latest);
        this.emit('orderUpdated', latest);
        return { success: true, outcome: 'already_final', order: latest, error: null };
      }
      return this.finishCancel(latest, reason);
    }

    // The order may have filled or been canceled exchange-side in the meantime
    const message = errorMessage(result.error);
    const refreshed = await this.getOrderStatus(latest);
    if (refreshed.isTerminal) {
      logger.info('Cancel skipped, order already final', {
        orderId: refreshed.id,
        status: refreshed.status,
      });
      return { success: true, outcome: 'already_final', order: refreshed, error: null };
    }

    refreshed.recordError(message, this.clock());
    this.orders.save(refreshed);
    logger.error('Order cancel failed', {
      orderId: refreshed.id,
      exchangeId,
      error: message,
    });
    return { success: false, outcome: 'failed', order: refreshed, error: message };
  }

  private finishCancel(order: Order, reason: string): CancelResult {
    if (order.status !== 'CANCELED') {
      order.cancel(reason, this.clock());
    }
    this.orders.save(order);
    logger.info('Order canceled', {
      orderId: order.id,
      exchangeId: order.exchangeId,
      side: order.side,
      reason,
    });
    this.emit('orderCanceled', order, reason);
    return { success: true, outcome: 'canceled', order, error: null };
  }

  /**
   * Cancel every open order, optionally for one symbol
   */
  async emergencyCancelAll(symbol?: string): Promise<CancelResult[]> {
    const open = this.orders
      .getOpenOrders()
      .filter((order) => symbol === undefined || order.symbol === symbol);

    logger.warn('Emergency cancel of open orders', { count: open.length, symbol });

    const results: CancelResult[] = [];
    for (const order of open) {
      results.push(await this.cancelOrder(order, 'Emergency cancel'));
    }
    return results;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getOrder(orderId: string): Order | undefined {
    return this.orders.getById(orderId);
  }

  getAllOrders(): Order[] {
    return this.orders.getAll();
  }

  getOpenOrders(side?: OrderSide): Order[] {
    return this.orders.getOpenOrders(side);
  }

  getOrdersByDeal(dealId: string): Order[] {
    return this.orders.getByDeal(dealId);
  }

  getStatistics(): OrderStatistics {
    const byStatus: Record<OrderStatus, number> = {
      PENDING: 0,
      OPEN: 0,
      PARTIALLY_FILLED: 0,
      FILLED: 0,
      CANCELED: 0,
      FAILED: 0,
    };
    const all = this.orders.getAll();
    for (const order of all) {
      byStatus[order.status] += 1;
    }
    return {
      total: all.length,
      byStatus,
      placementAttempts: this.placementAttempts,
      placementFailures: this.placementFailures,
    };
  }
}

function parseDecimal(value: Decimal.Value, field: string): Decimal {
  try {
    const parsed = new Decimal(value);
    if (!parsed.isFinite()) {
      throw new ValidationError(`${field} must be finite`);
    }
    return parsed;
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError(`${field} is not a number: ${String(value)}`);
  }
}

function parsePositive(value: Decimal.Value, field: string): Decimal {
  const parsed = parseDecimal(value, field);
  if (parsed.lte(0)) {
    throw new ValidationError(`${field} must be positive, got ${parsed.toString()}`);
  }
  return parsed;
}

function parseNonNegative(value: Decimal.Value, field: string): Decimal {
  const parsed = parseDecimal(value, field);
  if (parsed.lt(0)) {
    throw new ValidationError(`${field} must not be negative, got ${parsed.toString()}`);
  }
  return parsed;
}
