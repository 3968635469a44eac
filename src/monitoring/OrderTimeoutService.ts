/**
 * Order Timeout Service
 *
 * Remediates stale BUY orders: cancel, then recreate near the market
 * price. Recreations are bounded per deal by a count and a cooldown; a
 * deal that hits the cap is canceled instead.
 */

import type { Decimal } from 'decimal.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { Deal } from '../deals/Deal.js';
import type { DealService } from '../deals/DealService.js';
import type { ExchangeGateway } from '../exchange/types.js';
import type { Order } from '../orders/Order.js';
import type { OrderService } from '../orders/OrderService.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { floorToStep } from '../utils/decimal.js';
import type {
  OrderTimeoutConfig,
  RemediationOutcome,
  RemediationResult,
  StalenessReason,
} from './types.js';

const MS_PER_MINUTE = 60_000;

export class OrderTimeoutService {
  private readonly config: OrderTimeoutConfig;
  private readonly orderService: OrderService;
  private readonly dealService: DealService;
  private readonly gateway: ExchangeGateway;
  private readonly clock: Clock;

  constructor(
    config: OrderTimeoutConfig,
    orderService: OrderService,
    dealService: DealService,
    gateway: ExchangeGateway,
    clock: Clock = systemClock
  ) {
    this.config = config;
    this.orderService = orderService;
    this.dealService = dealService;
    this.gateway = gateway;
    this.clock = clock;
  }

  /**
   * Handle one stale BUY order
   */
  async handleStaleOrder(
    order: Order,
    reasons: StalenessReason[],
    marketPrice: Decimal | null
  ): Promise<RemediationResult> {
    const deal = order.dealId !== null ? this.dealService.getDeal(order.dealId) : undefined;
    const reasonText = reasons.map((reason) => reason.detail).join('; ');

    // Step 1: Respect the recreation cooldown
    if (deal && this.inCooldown(deal)) {
      return this.result('deferred', order, null, 'Recreation cooldown active');
    }

    // Step 2: Cancel the stale order
    const cancel = await this.orderService.cancelOrder(order, `Stale order: ${reasonText}`);
    if (!cancel.success) {
      return this.result('cancel_failed', cancel.order, null, cancel.error ?? 'Cancel failed');
    }
    if (cancel.order.isFilled) {
      return this.result('already_final', cancel.order, null, 'Order filled before cancel');
    }

    if (!deal || !deal.isOpen) {
      return this.result('canceled', cancel.order, null, 'No open deal to recreate for');
    }
    if (cancel.order.filledAmount.gt(0)) {
      logger.error('Stale BUY was partially filled before cancel, deal needs a manual close', {
        dealId: deal.id,
        orderId: cancel.order.id,
        filled: cancel.order.filledAmount.toString(),
      });
      return this.result('canceled', cancel.order, null, 'Partially filled, not recreated');
    }

    // Step 3: Give up on the deal at the recreation cap
    if (deal.recreationCount >= this.config.maxRecreationsPerDeal) {
      await this.dealService.cancelDeal(deal, 'Recreation limit reached');
      return this.result(
        'deal_canceled',
        cancel.order,
        null,
        `Recreation limit ${this.config.maxRecreationsPerDeal} reached`
      );
    }

    // Step 4: Recreate near the market
    return this.recreate(deal, cancel.order, marketPrice);
  }

  private async recreate(deal: Deal, canceled: Order, marketPrice: Decimal | null): Promise<RemediationResult> {
    let price: Decimal;
    try {
      const market = marketPrice ?? (await this.gateway.fetchTicker(deal.symbol));
      price = floorToStep(market.mul(this.config.repriceFactor), deal.pair.priceStep);
    } catch (error) {
      return this.abandon(deal, canceled, `Market price unavailable: ${errorMessage(error)}`);
    }

    const placement = await this.orderService.createAndPlaceBuyOrder({
      symbol: deal.symbol,
      amount: canceled.amount,
      price,
      dealId: deal.id,
    });
    if (!placement.success || !placement.order) {
      return this.abandon(deal, canceled, placement.error ?? 'Replacement BUY failed');
    }

    this.dealService.replaceBuyOrder(deal, placement.order);
    logger.info('Stale BUY order recreated', {
      dealId: deal.id,
      previousOrderId: canceled.id,
      newOrderId: placement.order.id,
      previousPrice: canceled.price.toString(),
      newPrice: price.toString(),
      recreations: deal.recreationCount,
    });
    return this.result('recreated', canceled, placement.order, `Recreated at ${price.toString()}`);
  }

  /**
   * The BUY is gone and no replacement exists: the deal cannot progress
   */
  private async abandon(deal: Deal, canceled: Order, detail: string): Promise<RemediationResult> {
    logger.error('BUY recreation failed, canceling deal', { dealId: deal.id, error: detail });
    await this.dealService.cancelDeal(deal, `BUY recreation failed: ${detail}`);
    return this.result('recreation_failed', canceled, null, detail);
  }

  private inCooldown(deal: Deal): boolean {
    if (deal.lastRecreatedAt === null) return false;
    const cooldownMs = this.config.minMinutesBetweenRecreations * MS_PER_MINUTE;
    return this.clock() - deal.lastRecreatedAt < cooldownMs;
  }

  private result(
    outcome: RemediationOutcome,
    order: Order,
    replacement: Order | null,
    detail: string
  ): RemediationResult {
    return { outcome, order, replacement, detail };
  }
}
