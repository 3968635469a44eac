/**
 * Tests for OrderExecutionService
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Decimal } from 'decimal.js';
import { createEngine, scenarioStrategy, type Engine } from '../support.js';

describe('OrderExecutionService', () => {
  let engine: Engine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe('executeTradingStrategy', () => {
    it('should open a deal with a placed BUY and a pending SELL', async () => {
      const completed = vi.fn();
      engine.executionService.on('executionCompleted', completed);

      const report = await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());

      expect(report.success).toBe(true);
      expect(report.dealId).toBe('deal-1');
      expect(report.buyOrder?.status).toBe('OPEN');
      expect(report.buyOrder?.exchangeId).toBe('1');
      expect(report.sellOrder?.status).toBe('PENDING');
      expect(report.sellOrder?.price.toString()).toBe('3030');
      expect(completed).toHaveBeenCalledWith(report);

      const deal = engine.dealService.getDeal('deal-1');
      expect(deal?.buyOrder?.id).toBe(report.buyOrder?.id);
      expect(deal?.sellOrder?.id).toBe(report.sellOrder?.id);
      expect(report.buyOrder?.dealId).toBe('deal-1');
      expect(report.sellOrder?.dealId).toBe('deal-1');
    });

    it('should accept the positional 5-tuple', async () => {
      const { buyPrice, coinsToBuy, sellPrice, coinsToSell } = scenarioStrategy();

      const report = await engine.executionService.executeTradingStrategy(engine.pair, [
        buyPrice,
        coinsToBuy,
        sellPrice,
        coinsToSell,
        {},
      ]);

      expect(report.success).toBe(true);
    });

    it('should reject an invalid strategy before touching anything', async () => {
      const report = await engine.executionService.executeTradingStrategy(engine.pair, {
        ...scenarioStrategy(),
        sellPrice: new Decimal('3030.005'),
      });

      expect(report.success).toBe(false);
      expect(report.errorCode).toBe('VALIDATION_ERROR');
      expect(report.error).toBe('Sell price 3030.005 is not a multiple of 0.01');
      expect(engine.dealService.getAllDeals()).toHaveLength(0);
      expect(engine.orders.getAll()).toHaveLength(0);
    });

    it('should reject a malformed strategy', async () => {
      const report = await engine.executionService.executeTradingStrategy(engine.pair, 'buy now');

      expect(report.errorCode).toBe('VALIDATION_ERROR');
      expect(report.error).toBe('Strategy result must be an object or a 5-tuple');
    });

    it('should stop on insufficient balance', async () => {
      engine.gateway.setBalance('USDT', '50');

      const report = await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());

      expect(report.errorCode).toBe('INSUFFICIENT_BALANCE');
      expect(report.error).toBe('Insufficient USDT balance: available 50, required 99.6');
      expect(engine.dealService.getAllDeals()).toHaveLength(0);
    });

    it('should leave no orphaned order after three failed BUY placements', async () => {
      engine.gateway.failNext('createOrder', 3);
      const failed = vi.fn();
      engine.executionService.on('executionFailed', failed);

      const report = await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());

      expect(report.success).toBe(false);
      expect(report.errorCode).toBe('EXCHANGE_ERROR');
      expect(report.dealId).toBe('deal-1');
      expect(report.buyOrder?.status).toBe('FAILED');
      expect(report.buyOrder?.retries).toBe(3);
      expect(engine.dealService.getDeal('deal-1')?.status).toBe('CANCELED');
      expect(engine.dealService.getOpenDeals()).toHaveLength(0);
      expect(engine.orderService.getOpenOrders()).toHaveLength(0);
      expect(engine.gateway.listOrders()).toHaveLength(0);
      expect(failed).toHaveBeenCalledTimes(1);
    });

    it('should emergency-cancel the BUY when the SELL cannot be recorded', async () => {
      vi.spyOn(engine.orderService, 'createLocalSellOrder').mockReturnValue({
        success: false,
        order: null,
        error: 'disk full',
      });
      const emergency = vi.fn();
      engine.executionService.on('emergencyCancel', emergency);

      const report = await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());

      expect(report.success).toBe(false);
      expect(report.errorCode).toBe('PARTIAL_FAILURE');
      expect(report.error).toBe('disk full');
      expect(report.emergencyCancel?.outcome).toBe('canceled');
      expect(report.buyOrder?.status).toBe('CANCELED');
      expect(engine.gateway.listOrders()[0]?.status).toBe('canceled');
      expect(engine.dealService.getDeal('deal-1')?.status).toBe('CANCELED');
      expect(emergency).toHaveBeenCalledTimes(1);
    });
  });

  describe('getExecutionStatistics', () => {
    it('should count each call once', async () => {
      await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());
      engine.gateway.setBalance('USDT', '0');
      await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());

      const stats = engine.executionService.getExecutionStatistics();

      expect(stats.totalExecutions).toBe(2);
      expect(stats.successfulExecutions).toBe(1);
      expect(stats.failedExecutions).toBe(1);
      expect(stats.successRate).toBe(0.5);
      expect(stats.totalVolume).toBe('99.6');
      expect(stats.totalFees).toBe('0.0996');
    });
  });

  describe('emergencyStopAllTrading', () => {
    it('should cancel open orders and deals', async () => {
      await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());

      const report = await engine.executionService.emergencyStopAllTrading();

      // the placed BUY and the pending SELL
      expect(report).toEqual({ ordersCanceled: 2, ordersFailed: 0, dealsCanceled: 1 });
      expect(engine.dealService.getOpenDeals()).toHaveLength(0);
    });
  });
});
