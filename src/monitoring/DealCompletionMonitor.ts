/**
 * Deal Completion Monitor
 *
 * Drives open deals forward on an interval: pending SELLs go out once
 * their BUY filled, and finished deals are closed.
 */

import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import type { DealService } from '../deals/DealService.js';
import type { CompletionCheckResult } from '../deals/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { PollingLoop } from './PollingLoop.js';
import type { DealCompletionMonitorEvents, IntervalMonitorConfig, MonitorStatus } from './types.js';

export class DealCompletionMonitor extends EventEmitter<DealCompletionMonitorEvents> {
  private readonly config: IntervalMonitorConfig;
  private readonly dealService: DealService;
  private readonly loop: PollingLoop;

  constructor(config: IntervalMonitorConfig, dealService: DealService, clock: Clock = systemClock) {
    super();
    this.config = config;
    this.dealService = dealService;
    this.loop = new PollingLoop(
      'Deal completion monitor',
      config.intervalMs,
      async () => {
        await this.checkDeals();
      },
      clock
    );
  }

  start(): void {
    if (!this.config.enabled) {
      logger.info('Deal completion monitor disabled');
      return;
    }
    this.loop.start();
  }

  stop(): Promise<void> {
    return this.loop.stop();
  }

  async checkDeals(): Promise<CompletionCheckResult> {
    const result = await this.dealService.checkDealCompletion();
    if (result.sellsPlaced > 0 || result.dealsClosed > 0 || result.errors > 0) {
      logger.info('Deal completion check', { ...result });
    }
    this.emit('completionChecked', result);
    return result;
  }

  getStatus(): MonitorStatus {
    return this.loop.getStatus();
  }
}
