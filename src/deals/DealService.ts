/**
 * Deal Service
 *
 * Creates deals, links their orders and drives them to completion:
 * the pending SELL goes to the exchange once the BUY filled, and a deal
 * closes with its realized profit once both sides filled.
 */

import EventEmitter from 'eventemitter3';
import { Decimal } from 'decimal.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { roundToStep } from '../utils/decimal.js';
import type { ExchangeGateway } from '../exchange/types.js';
import type { CurrencyPair } from '../market/types.js';
import type { Order } from '../orders/Order.js';
import type { OrderService } from '../orders/OrderService.js';
import type { DealRepository, OrderRepository } from '../persistence/types.js';
import type { Deal } from './Deal.js';
import { DealFactory } from './DealFactory.js';
import type {
  BalanceCheckOutcome,
  CompletionCheckResult,
  DealServiceEvents,
  DealStatistics,
} from './types.js';

export class DealService extends EventEmitter<DealServiceEvents> {
  private readonly gateway: ExchangeGateway;
  private readonly deals: DealRepository;
  private readonly orders: OrderRepository;
  private readonly orderService: OrderService;
  private readonly factory: DealFactory;
  private readonly clock: Clock;

  constructor(
    gateway: ExchangeGateway,
    deals: DealRepository,
    orders: OrderRepository,
    orderService: OrderService,
    factory: DealFactory = new DealFactory(),
    clock: Clock = systemClock
  ) {
    super();
    this.gateway = gateway;
    this.deals = deals;
    this.orders = orders;
    this.orderService = orderService;
    this.factory = factory;
    this.clock = clock;
  }

  /**
   * Create and persist an OPEN deal without orders
   */
  createNewDeal(pair: CurrencyPair): Deal {
    const deal = this.deals.save(this.factory.create(pair));
    logger.info('Deal created', { dealId: deal.id, symbol: deal.symbol });
    this.emit('dealCreated', deal);
    return deal;
  }

  /**
   * Check the quote balance covers amount * price
   */
  async checkBalanceBeforeDeal(
    pair: CurrencyPair,
    amount: Decimal,
    price: Decimal
  ): Promise<BalanceCheckOutcome> {
    try {
      const check = await this.gateway.checkSufficientBalance({
        symbol: pair.symbol,
        side: 'BUY',
        amount,
        price,
      });
      if (!check.ok) {
        logger.warn('Insufficient balance for deal', {
          symbol: pair.symbol,
          currency: check.currency,
          available: check.available.toString(),
          required: check.required.toString(),
        });
      }
      return { ...check, error: null };
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Balance check failed', { symbol: pair.symbol, error: message });
      return {
        ok: false,
        currency: pair.quoteCurrency,
        available: new Decimal(0),
        required: amount.mul(price),
        error: message,
      };
    }
  }

  /**
   * Link BUY and SELL to the deal and persist all three
   */
  attachOrders(deal: Deal, buyOrder: Order, sellOrder: Order): Deal {
    deal.attachOrders(buyOrder, sellOrder, this.clock());
    this.orders.save(buyOrder);
    this.orders.save(sellOrder);
    this.deals.save(deal);
    logger.debug('Orders attached to deal', {
      dealId: deal.id,
      buyOrderId: buyOrder.id,
      sellOrderId: sellOrder.id,
    });
    return deal;
  }

  /**
   * Swap a recreated BUY into the deal and reprice its pending SELL
   * with the pair's profit markup
   */
  replaceBuyOrder(deal: Deal, newBuyOrder: Order): Deal {
    const now = this.clock();
    const previous = deal.replaceBuyOrder(newBuyOrder, now);
    this.orders.save(newBuyOrder);

    const sell = deal.sellOrder;
    if (sell && sell.isPending) {
      const markup = deal.pair.profitMarkupPercent.plus(100).div(100);
      const sellPrice = roundToStep(newBuyOrder.price.mul(markup), deal.pair.priceStep);
      sell.reprice(sellPrice, sell.amount, now);
      this.orders.save(sell);
    }
    this.deals.save(deal);

    logger.info('Deal BUY order replaced', {
      dealId: deal.id,
      previousOrderId: previous?.id,
      newOrderId: newBuyOrder.id,
      newPrice: newBuyOrder.price.toString(),
      sellPrice: sell?.price.toString(),
      recreations: deal.recreationCount,
    });
    if (previous) {
      this.emit('buyOrderReplaced', deal, previous, newBuyOrder);
    }
    return deal;
  }

  /**
   * Advance open deals: place pending SELLs whose BUY filled and close
   * deals whose both orders filled. Canceled BUYs are left to the
   * stale order remediation.
   */
  async checkDealCompletion(deal?: Deal): Promise<CompletionCheckResult> {
    const result: CompletionCheckResult = { sellsPlaced: 0, dealsClosed: 0, errors: 0 };
    const candidates = deal ? [deal] : this.deals.getOpenDeals();

    for (const candidate of candidates) {
      try {
        await this.advanceDeal(candidate, result);
      } catch (error) {
        result.errors += 1;
        logger.error('Deal completion check failed', {
          dealId: candidate.id,
          error: errorMessage(error),
        });
      }
    }
    return result;
  }

  private async advanceDeal(deal: Deal, result: CompletionCheckResult): Promise<void> {
    const latestDeal = this.deals.getById(deal.id) ?? deal;
    if (!latestDeal.isOpen) return;

    let buy = latestDeal.buyOrder;
    let sell = latestDeal.sellOrder;
    if (!buy || !sell) return;

    if (buy.isActive) {
      buy = await this.orderService.getOrderStatus(buy);
    }
    if (!buy.isFilled) return;

    if (sell.isPending) {
      const placement = await this.orderService.placeExistingOrder(sell);
      if (!placement.success) {
        result.errors += 1;
        logger.error('Failed to place SELL for filled BUY', {
          dealId: latestDeal.id,
          sellOrderId: sell.id,
          error: placement.error,
        });
        return;
      }
      result.sellsPlaced += 1;
      this.emit('sellOrderPlaced', latestDeal, sell);
    }

    if (sell.isActive) {
      sell = await this.orderService.getOrderStatus(sell);
    }

    if (sell.isFilled) {
      const profit = this.calculateProfit(buy, sell);
      latestDeal.close(profit, this.clock());
      this.deals.save(latestDeal);
      result.dealsClosed += 1;
      logger.info('Deal closed', {
        dealId: latestDeal.id,
        symbol: latestDeal.symbol,
        profit: profit.toString(),
      });
      this.emit('dealClosed', latestDeal);
    }
  }

  /**
   * Sell revenue minus sell fees minus buy cost and buy fees
   */
  calculateProfit(buy: Order, sell: Order): Decimal {
    const revenue = sell.executedValue.minus(sell.fees);
    const cost = buy.executedValue.plus(buy.fees);
    return revenue.minus(cost);
  }

  /**
   * Cancel every unfinished order of the deal, then the deal itself
   */
  async cancelDeal(deal: Deal, reason: string): Promise<boolean> {
    if (!deal.isOpen) return false;

    for (const order of deal.orders) {
      if (order.isTerminal) continue;
      const cancel = await this.orderService.cancelOrder(order, reason);
      if (!cancel.success) {
        logger.error('Deal cancel aborted, order could not be canceled', {
          dealId: deal.id,
          orderId: order.id,
          error: cancel.error,
        });
        return false;
      }
    }

    deal.cancel(this.clock());
    this.deals.save(deal);
    logger.warn('Deal canceled', { dealId: deal.id, symbol: deal.symbol, reason });
    this.emit('dealCanceled', deal, reason);
    return true;
  }

  /**
   * Cancel what is still open and close the deal with the profit
   * realized so far
   */
  async forceCloseDeal(deal: Deal, reason: string): Promise<boolean> {
    if (!deal.isOpen) return false;

    for (const order of deal.orders) {
      if (order.isTerminal) continue;
      const cancel = await this.orderService.cancelOrder(order, reason);
      if (!cancel.success) {
        logger.error('Force close aborted, order could not be canceled', {
          dealId: deal.id,
          orderId: order.id,
          error: cancel.error,
        });
        return false;
      }
    }

    const buy = deal.buyOrder;
    const sell = deal.sellOrder;
    const profit = buy && sell ? this.calculateProfit(buy, sell) : new Decimal(0);
    deal.close(profit, this.clock());
    this.deals.save(deal);
    logger.warn('Deal force-closed', {
      dealId: deal.id,
      reason,
      profit: profit.toString(),
    });
    this.emit('dealClosed', deal);
    return true;
  }

  getDeal(dealId: string): Deal | undefined {
    return this.deals.getById(dealId);
  }

  getAllDeals(): Deal[] {
    return this.deals.getAll();
  }

  getOpenDeals(symbol?: string): Deal[] {
    return this.deals.getOpenDeals(symbol);
  }

  getStatistics(): DealStatistics {
    const all = this.deals.getAll();
    let realized = new Decimal(0);
    let open = 0;
    let closed = 0;
    let canceled = 0;
    for (const deal of all) {
      if (deal.status === 'OPEN') open += 1;
      if (deal.status === 'CANCELED') canceled += 1;
      if (deal.status === 'CLOSED') {
        closed += 1;
        realized = realized.plus(deal.profit ?? 0);
      }
    }
    return {
      total: all.length,
      open,
      closed,
      canceled,
      realizedProfit: realized.toString(),
    };
  }
}
