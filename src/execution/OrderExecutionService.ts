/**
 * Order Execution Service
 *
 * Turns one strategy result into one tracked Deal:
 * Validation → Balance Check → Deal → BUY placement → local SELL → Attach
 *
 * Any failure after the BUY reached the exchange cancels that BUY before
 * the failure is reported, so no exchange order is left untracked.
 */

import EventEmitter from 'eventemitter3';
import { Decimal } from 'decimal.js';
import { PartialFailureError, errorMessage, type ErrorCode } from '../errors.js';
import { logger } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { CurrencyPair } from '../market/types.js';
import type { Deal } from '../deals/Deal.js';
import type { DealService } from '../deals/DealService.js';
import type { Order } from '../orders/Order.js';
import type { OrderService } from '../orders/OrderService.js';
import type { CancelResult } from '../orders/types.js';
import { StrategyResultValidator } from './StrategyResultValidator.js';
import type {
  EmergencyStopReport,
  ExecutionEvents,
  ExecutionReport,
  ExecutionStatistics,
} from './types.js';

interface Counters {
  total: number;
  successful: number;
  failed: number;
  volume: Decimal;
  fees: Decimal;
  totalDurationMs: number;
}

export class OrderExecutionService extends EventEmitter<ExecutionEvents> {
  private readonly orderService: OrderService;
  private readonly dealService: DealService;
  private readonly validator: StrategyResultValidator;
  private readonly clock: Clock;
  private readonly counters: Counters = {
    total: 0,
    successful: 0,
    failed: 0,
    volume: new Decimal(0),
    fees: new Decimal(0),
    totalDurationMs: 0,
  };

  constructor(orderService: OrderService, dealService: DealService, clock: Clock = systemClock) {
    super();
    this.orderService = orderService;
    this.dealService = dealService;
    this.validator = new StrategyResultValidator();
    this.clock = clock;
  }

  /**
   * Execute one trade decision. Never throws.
   */
  async executeTradingStrategy(pair: CurrencyPair, strategyResult: unknown): Promise<ExecutionReport> {
    const startedAt = this.clock();
    let report: ExecutionReport;

    try {
      report = await this.execute(pair, strategyResult, startedAt);
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Unexpected execution error', { symbol: pair.symbol, error: message });
      report = this.failure(pair, startedAt, message, 'PARTIAL_FAILURE');
    }

    this.recordStatistics(pair, report);

    if (report.success) {
      logger.info('Trade execution completed', {
        symbol: report.symbol,
        dealId: report.dealId,
        buyOrderId: report.buyOrder?.id,
        sellOrderId: report.sellOrder?.id,
        durationMs: report.durationMs,
      });
      this.emit('executionCompleted', report);
    } else {
      logger.warn('Trade execution failed', {
        symbol: report.symbol,
        dealId: report.dealId,
        code: report.errorCode,
        error: report.error,
      });
      this.emit('executionFailed', report);
    }
    return report;
  }

  private async execute(
    pair: CurrencyPair,
    strategyResult: unknown,
    startedAt: number
  ): Promise<ExecutionReport> {
    // Step 1: Validate
    const validation = this.validator.validate(pair, strategyResult);
    if (!validation.valid || !validation.strategy) {
      return this.failure(pair, startedAt, validation.errors.join(', '), 'VALIDATION_ERROR');
    }
    if (validation.warnings.length > 0) {
      logger.warn('Strategy validation warnings', {
        symbol: pair.symbol,
        warnings: validation.warnings,
      });
    }
    const { buyPrice, coinsToBuy, sellPrice, coinsToSell } = validation.strategy;

    // Step 2: Balance pre-check
    const balance = await this.dealService.checkBalanceBeforeDeal(pair, coinsToBuy, buyPrice);
    if (!balance.ok) {
      const message =
        balance.error ??
        `Insufficient ${balance.currency} balance: available ${balance.available.toString()}, required ${balance.required.toString()}`;
      return this.failure(pair, startedAt, message, 'INSUFFICIENT_BALANCE');
    }

    // Step 3: Deal
    const deal = this.dealService.createNewDeal(pair);

    // Step 4: BUY
    const buyResult = await this.orderService.createAndPlaceBuyOrder({
      symbol: pair.symbol,
      amount: coinsToBuy,
      price: buyPrice,
      dealId: deal.id,
    });
    const buyOrder = buyResult.order;
    if (!buyResult.success || !buyOrder) {
      await this.dealService.cancelDeal(deal, 'BUY placement failed');
      return {
        ...this.failure(pair, startedAt, buyResult.error ?? 'BUY placement failed', 'EXCHANGE_ERROR'),
        dealId: deal.id,
        buyOrder,
      };
    }

    // Steps 5-6: local SELL and attach, rolled back on failure
    try {
      const sellResult = this.orderService.createLocalSellOrder({
        symbol: pair.symbol,
        amount: coinsToSell,
        price: sellPrice,
        dealId: deal.id,
      });
      if (!sellResult.success || !sellResult.order) {
        throw new PartialFailureError(buyOrder.id, sellResult.error ?? 'SELL order could not be recorded');
      }
      this.dealService.attachOrders(deal, buyOrder, sellResult.order);

      return {
        success: true,
        symbol: pair.symbol,
        dealId: deal.id,
        buyOrder,
        sellOrder: sellResult.order,
        error: null,
        errorCode: null,
        emergencyCancel: null,
        durationMs: this.clock() - startedAt,
      };
    } catch (error) {
      return this.rollback(pair, deal, buyOrder, errorMessage(error), startedAt);
    }
  }

  /**
   * Cancel the placed BUY, drop the deal and report the partial failure
   */
  private async rollback(
    pair: CurrencyPair,
    deal: Deal,
    buyOrder: Order,
    reason: string,
    startedAt: number
  ): Promise<ExecutionReport> {
    logger.error('Execution failed after BUY placement, cancelling BUY', {
      dealId: deal.id,
      buyOrderId: buyOrder.id,
      reason,
    });

    const cancel = await this.orderService.cancelOrder(buyOrder, `Emergency cancel: ${reason}`);
    this.emit('emergencyCancel', buyOrder, cancel);
    if (cancel.outcome === 'already_final' && cancel.order.isFilled) {
      logger.error('Emergency cancel found BUY already filled', {
        dealId: deal.id,
        buyOrderId: buyOrder.id,
      });
    }

    for (const order of this.orderService.getOrdersByDeal(deal.id)) {
      if (order.id !== buyOrder.id && order.isPending) {
        await this.orderService.cancelOrder(order, 'Emergency cancel');
      }
    }
    await this.dealService.cancelDeal(deal, reason);

    return {
      ...this.failure(pair, startedAt, reason, 'PARTIAL_FAILURE'),
      dealId: deal.id,
      buyOrder: cancel.order,
      emergencyCancel: cancel,
    };
  }

  private failure(
    pair: CurrencyPair,
    startedAt: number,
    error: string,
    errorCode: ErrorCode
  ): ExecutionReport {
    return {
      success: false,
      symbol: pair.symbol,
      dealId: null,
      buyOrder: null,
      sellOrder: null,
      error,
      errorCode,
      emergencyCancel: null,
      durationMs: this.clock() - startedAt,
    };
  }

  /**
   * Updated exactly once per executeTradingStrategy call
   */
  private recordStatistics(pair: CurrencyPair, report: ExecutionReport): void {
    this.counters.total += 1;
    this.counters.totalDurationMs += report.durationMs;
    if (report.success) {
      this.counters.successful += 1;
    } else {
      this.counters.failed += 1;
    }

    const buy = report.buyOrder;
    if (buy && buy.exchangeId !== null) {
      const volume = buy.notional;
      this.counters.volume = this.counters.volume.plus(volume);
      this.counters.fees = this.counters.fees.plus(volume.mul(pair.takerFeePercent).div(100));
    }
  }

  getExecutionStatistics(): ExecutionStatistics {
    const { total, successful, failed, volume, fees, totalDurationMs } = this.counters;
    return {
      totalExecutions: total,
      successfulExecutions: successful,
      failedExecutions: failed,
      totalVolume: volume.toString(),
      totalFees: fees.toString(),
      averageExecutionTimeMs: total > 0 ? totalDurationMs / total : 0,
      successRate: total > 0 ? successful / total : 0,
    };
  }

  /**
   * Cancel every open and pending order, then every open deal
   */
  async emergencyStopAllTrading(): Promise<EmergencyStopReport> {
    logger.warn('Emergency stop of all trading requested');

    const cancels: CancelResult[] = await this.orderService.emergencyCancelAll();
    let dealsCanceled = 0;
    for (const deal of this.dealService.getOpenDeals()) {
      if (await this.dealService.cancelDeal(deal, 'Emergency stop')) {
        dealsCanceled += 1;
      }
    }

    const report: EmergencyStopReport = {
      ordersCanceled: cancels.filter((c) => c.outcome === 'canceled').length,
      ordersFailed: cancels.filter((c) => !c.success).length,
      dealsCanceled,
    };
    logger.warn('Emergency stop completed', { ...report });
    return report;
  }
}
