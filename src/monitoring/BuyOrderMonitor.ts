/**
 * Buy Order Monitor
 *
 * Periodically reviews open BUY orders. Orders past the grace period are
 * refreshed from the exchange, checked against the staleness policy and,
 * when stale, handed to the Order Timeout Service.
 */

import EventEmitter from 'eventemitter3';
import type { Decimal } from 'decimal.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ExchangeGateway } from '../exchange/types.js';
import type { OrderService } from '../orders/OrderService.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { PollingLoop } from './PollingLoop.js';
import type { OrderTimeoutService } from './OrderTimeoutService.js';
import type { StalenessPolicy } from './StalenessPolicy.js';
import type {
  BuyMonitorTickResult,
  BuyOrderMonitorConfig,
  BuyOrderMonitorEvents,
  MonitorStatus,
} from './types.js';

export class BuyOrderMonitor extends EventEmitter<BuyOrderMonitorEvents> {
  private readonly config: BuyOrderMonitorConfig;
  private readonly orderService: OrderService;
  private readonly gateway: ExchangeGateway;
  private readonly policy: StalenessPolicy;
  private readonly timeoutService: OrderTimeoutService;
  private readonly clock: Clock;
  private readonly loop: PollingLoop;
  private lastSummaryAt: number | null = null;

  constructor(
    config: BuyOrderMonitorConfig,
    orderService: OrderService,
    gateway: ExchangeGateway,
    policy: StalenessPolicy,
    timeoutService: OrderTimeoutService,
    clock: Clock = systemClock
  ) {
    super();
    this.config = config;
    this.orderService = orderService;
    this.gateway = gateway;
    this.policy = policy;
    this.timeoutService = timeoutService;
    this.clock = clock;
    this.loop = new PollingLoop(
      'Buy order monitor',
      config.checkIntervalMs,
      async () => {
        await this.checkOrders();
      },
      clock
    );
  }

  start(): void {
    if (!this.config.enabled) {
      logger.info('Buy order monitor disabled');
      return;
    }
    this.loop.start();
  }

  stop(): Promise<void> {
    return this.loop.stop();
  }

  /**
   * One monitoring pass over all placed BUY orders
   */
  async checkOrders(): Promise<BuyMonitorTickResult> {
    const now = this.clock();
    const result: BuyMonitorTickResult = { checked: 0, skippedGracePeriod: 0, stale: 0, remediations: [] };
    const prices = new Map<string, Decimal | null>();

    // Partially filled BUYs are left to fill; replacing them would drop the fill
    const candidates = this.orderService.getOpenOrders('BUY').filter((order) => order.status === 'OPEN');

    for (const candidate of candidates) {
      if (now - candidate.createdAt < this.config.gracePeriodMs) {
        result.skippedGracePeriod += 1;
        continue;
      }

      const order = await this.orderService.getOrderStatus(candidate);
      result.checked += 1;
      if (order.status !== 'OPEN') continue;

      const marketPrice = this.policy.needsMarketPrice ? await this.marketPrice(order.symbol, prices) : null;
      const reasons = this.policy.evaluate(order, { now, marketPrice });
      if (reasons.length === 0) continue;

      result.stale += 1;
      logger.warn('Stale BUY order detected', {
        orderId: order.id,
        dealId: order.dealId,
        symbol: order.symbol,
        price: order.price.toString(),
        marketPrice: marketPrice?.toString(),
        reasons: reasons.map((reason) => reason.detail),
      });
      this.emit('staleOrderDetected', { order, reasons, marketPrice });

      const remediation = await this.timeoutService.handleStaleOrder(order, reasons, marketPrice);
      logger.info('Stale BUY order handled', {
        orderId: order.id,
        outcome: remediation.outcome,
        detail: remediation.detail,
      });
      result.remediations.push(remediation);
      this.emit('orderRemediated', remediation);
    }

    if (result.stale === 0) {
      this.logSummary(now, candidates.length, result);
    }
    return result;
  }

  getStatus(): MonitorStatus {
    return this.loop.getStatus();
  }

  private async marketPrice(symbol: string, cache: Map<string, Decimal | null>): Promise<Decimal | null> {
    const cached = cache.get(symbol);
    if (cached !== undefined) return cached;

    let price: Decimal | null = null;
    try {
      price = await this.gateway.fetchTicker(symbol);
    } catch (error) {
      logger.warn('Ticker unavailable for staleness check', { symbol, error: errorMessage(error) });
    }
    cache.set(symbol, price);
    return price;
  }

  private logSummary(now: number, openOrders: number, result: BuyMonitorTickResult): void {
    if (this.lastSummaryAt !== null && now - this.lastSummaryAt < this.config.summaryIntervalMs) {
      return;
    }
    this.lastSummaryAt = now;
    logger.info('Buy order monitor summary', {
      openBuyOrders: openOrders,
      checked: result.checked,
      inGracePeriod: result.skippedGracePeriod,
    });
  }
}
