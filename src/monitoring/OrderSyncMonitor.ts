/**
 * Order Sync Monitor
 *
 * Keeps local order state in line with the exchange by refreshing every
 * placed, non-final order on an interval.
 */

import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import type { OrderService } from '../orders/OrderService.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { PollingLoop } from './PollingLoop.js';
import type { IntervalMonitorConfig, MonitorStatus, OrderSyncMonitorEvents, SyncResult } from './types.js';

export class OrderSyncMonitor extends EventEmitter<OrderSyncMonitorEvents> {
  private readonly config: IntervalMonitorConfig;
  private readonly orderService: OrderService;
  private readonly loop: PollingLoop;

  constructor(config: IntervalMonitorConfig, orderService: OrderService, clock: Clock = systemClock) {
    super();
    this.config = config;
    this.orderService = orderService;
    this.loop = new PollingLoop(
      'Order sync monitor',
      config.intervalMs,
      async () => {
        await this.syncOrders();
      },
      clock
    );
  }

  start(): void {
    if (!this.config.enabled) {
      logger.info('Order sync monitor disabled');
      return;
    }
    this.loop.start();
  }

  stop(): Promise<void> {
    return this.loop.stop();
  }

  async syncOrders(): Promise<SyncResult> {
    const result: SyncResult = { checked: 0, updated: 0 };

    for (const order of this.orderService.getOpenOrders()) {
      if (order.exchangeId === null) continue;

      const status = order.status;
      const filled = order.filledAmount;
      const refreshed = await this.orderService.getOrderStatus(order);
      result.checked += 1;

      if (refreshed.status !== status || !refreshed.filledAmount.eq(filled)) {
        result.updated += 1;
        logger.info('Order synced from exchange', {
          orderId: refreshed.id,
          from: status,
          to: refreshed.status,
          filled: refreshed.filledAmount.toString(),
        });
      }
    }

    if (result.updated > 0) {
      logger.debug('Order sync complete', { ...result });
    }
    this.emit('syncCompleted', result);
    return result;
  }

  getStatus(): MonitorStatus {
    return this.loop.getStatus();
  }
}
