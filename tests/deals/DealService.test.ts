/**
 * Tests for DealService
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Decimal } from 'decimal.js';
import type { Deal } from '../../src/deals/Deal.js';
import { createEngine, ethPair, scenarioStrategy, type Engine } from '../support.js';

async function openScenarioDeal(engine: Engine): Promise<Deal> {
  const report = await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());
  const deal = report.dealId ? engine.dealService.getDeal(report.dealId) : undefined;
  if (!deal) throw new Error(report.error ?? 'deal not opened');
  return deal;
}

describe('DealService', () => {
  let engine: Engine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe('createNewDeal', () => {
    it('should persist an OPEN deal without orders', () => {
      const created = vi.fn();
      engine.dealService.on('dealCreated', created);

      const deal = engine.dealService.createNewDeal(engine.pair);

      expect(deal.id).toBe('deal-1');
      expect(deal.status).toBe('OPEN');
      expect(deal.orders).toHaveLength(0);
      expect(engine.deals.getById('deal-1')).toBe(deal);
      expect(created).toHaveBeenCalledWith(deal);
    });
  });

  describe('checkBalanceBeforeDeal', () => {
    it('should report the shortfall', async () => {
      engine.gateway.setBalance('USDT', '50');

      const check = await engine.dealService.checkBalanceBeforeDeal(
        engine.pair,
        new Decimal('0.0332'),
        new Decimal('3000')
      );

      expect(check.ok).toBe(false);
      expect(check.currency).toBe('USDT');
      expect(check.available.toString()).toBe('50');
      expect(check.required.toString()).toBe('99.6');
      expect(check.error).toBeNull();
    });

    it('should turn a gateway error into a failed check', async () => {
      const check = await engine.dealService.checkBalanceBeforeDeal(
        ethPair({ symbol: 'XRPUSDT' }),
        new Decimal('10'),
        new Decimal('0.5')
      );

      expect(check.ok).toBe(false);
      expect(check.error).toBe('Invalid symbol XRPUSDT');
      expect(check.required.toString()).toBe('5');
    });
  });

  describe('checkDealCompletion', () => {
    it('should place the SELL after the BUY fills and close with the realized profit', async () => {
      const deal = await openScenarioDeal(engine);
      const closed = vi.fn();
      engine.dealService.on('dealClosed', closed);

      expect(await engine.dealService.checkDealCompletion()).toEqual({
        sellsPlaced: 0,
        dealsClosed: 0,
        errors: 0,
      });

      engine.gateway.fillOrder('1');
      expect(await engine.dealService.checkDealCompletion()).toEqual({
        sellsPlaced: 1,
        dealsClosed: 0,
        errors: 0,
      });
      expect(deal.sellOrder?.status).toBe('OPEN');
      expect(deal.sellOrder?.exchangeId).toBe('2');

      engine.gateway.fillOrder('2');
      expect(await engine.dealService.checkDealCompletion()).toEqual({
        sellsPlaced: 0,
        dealsClosed: 1,
        errors: 0,
      });

      // (100.596 - 0.100596) - (99.6 + 0.0996)
      expect(deal.status).toBe('CLOSED');
      expect(deal.profit?.toString()).toBe('0.795804');
      expect(closed).toHaveBeenCalledWith(deal);
      expect(engine.dealService.getStatistics()).toEqual({
        total: 1,
        open: 0,
        closed: 1,
        canceled: 0,
        realizedProfit: '0.795804',
      });
    });

    it('should count a SELL placement failure and keep the deal open', async () => {
      const deal = await openScenarioDeal(engine);
      engine.gateway.fillOrder('1');
      engine.gateway.failNext('createOrder', 3);

      const result = await engine.dealService.checkDealCompletion(deal);

      expect(result).toEqual({ sellsPlaced: 0, dealsClosed: 0, errors: 1 });
      expect(deal.sellOrder?.status).toBe('FAILED');
      expect(deal.status).toBe('OPEN');
    });
  });

  describe('replaceBuyOrder', () => {
    it('should swap the BUY and reprice the pending SELL with the markup', async () => {
      const deal = await openScenarioDeal(engine);
      const previous = deal.buyOrder;
      if (!previous) throw new Error('missing buy');
      await engine.orderService.cancelOrder(previous, 'Stale');
      const replacement = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '2990',
        dealId: deal.id,
      });
      if (!replacement.order) throw new Error('missing replacement');
      const replaced = vi.fn();
      engine.dealService.on('buyOrderReplaced', replaced);

      engine.dealService.replaceBuyOrder(deal, replacement.order);

      // 2990 * 1.01
      expect(deal.sellOrder?.price.toString()).toBe('3019.9');
      expect(deal.buyOrder).toBe(replacement.order);
      expect(deal.recreationCount).toBe(1);
      expect(replaced).toHaveBeenCalledWith(deal, previous, replacement.order);
    });
  });

  describe('cancelDeal', () => {
    it('should cancel the orders and then the deal, once', async () => {
      const deal = await openScenarioDeal(engine);
      const canceled = vi.fn();
      engine.dealService.on('dealCanceled', canceled);

      expect(await engine.dealService.cancelDeal(deal, 'Manual')).toBe(true);
      expect(await engine.dealService.cancelDeal(deal, 'Manual')).toBe(false);

      expect(deal.status).toBe('CANCELED');
      expect(deal.buyOrder?.status).toBe('CANCELED');
      expect(deal.sellOrder?.status).toBe('CANCELED');
      expect(engine.gateway.listOrders()[0]?.status).toBe('canceled');
      expect(canceled).toHaveBeenCalledTimes(1);
      expect(canceled).toHaveBeenCalledWith(deal, 'Manual');
    });

    it('should keep the deal open when the exchange refuses the cancel', async () => {
      const deal = await openScenarioDeal(engine);
      engine.gateway.failNext('cancelOrder', 3);

      expect(await engine.dealService.cancelDeal(deal, 'Manual')).toBe(false);
      expect(deal.status).toBe('OPEN');
    });
  });

  describe('forceCloseDeal', () => {
    it('should close an unfilled deal with zero profit', async () => {
      const deal = await openScenarioDeal(engine);

      expect(await engine.dealService.forceCloseDeal(deal, 'Shutdown')).toBe(true);

      expect(deal.status).toBe('CLOSED');
      expect(deal.profit?.toString()).toBe('0');
      expect(engine.dealService.getOpenDeals()).toHaveLength(0);
    });
  });
});
