/**
 * Tests for OrderService
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ExchangeError } from '../../src/errors.js';
import { createEngine, type Engine } from '../support.js';

describe('OrderService', () => {
  let engine: Engine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe('createAndPlaceBuyOrder', () => {
    it('should place a LIMIT BUY and mark it OPEN', async () => {
      const placed = vi.fn();
      engine.orderService.on('orderPlaced', placed);

      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });

      expect(result.success).toBe(true);
      expect(result.order?.status).toBe('OPEN');
      expect(result.order?.exchangeId).toBe('1');
      expect(result.order?.retries).toBe(1);
      expect(placed).toHaveBeenCalledTimes(1);
      expect(engine.orders.getById('order-1')?.status).toBe('OPEN');
    });

    it('should retry transient failures and succeed', async () => {
      engine.gateway.failNext('createOrder', 2);

      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });

      expect(result.success).toBe(true);
      expect(result.order?.retries).toBe(3);
      expect(engine.orderService.getStatistics().placementAttempts).toBe(3);
    });

    it('should mark the order FAILED after three failed attempts', async () => {
      engine.gateway.failNext('createOrder', 3);
      const failed = vi.fn();
      engine.orderService.on('orderFailed', failed);

      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });

      expect(result.success).toBe(false);
      expect(result.order?.status).toBe('FAILED');
      expect(result.order?.retries).toBe(3);
      expect(result.order?.exchangeId).toBeNull();
      expect(result.error).toBe('Simulated createOrder failure');
      expect(failed).toHaveBeenCalledTimes(1);
      expect(engine.orderService.getStatistics().placementFailures).toBe(1);
    });

    it('should not retry an exchange rejection', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.00015',
        price: '3000',
        dealId: null,
      });

      expect(result.success).toBe(false);
      expect(result.order?.retries).toBe(1);
      expect(result.error).toBe('Filter failure: LOT_SIZE');
    });

    it('should reject invalid input before creating an order', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '-1',
        price: '3000',
        dealId: null,
      });

      expect(result).toEqual({ success: false, order: null, error: 'amount must be positive, got -1' });
      expect(engine.orders.getAll()).toHaveLength(0);
    });
  });

  describe('createLocalSellOrder / placeExistingOrder', () => {
    it('should record a PENDING SELL and place it later', async () => {
      engine.gateway.setBalance('ETH', '1');
      const local = engine.orderService.createLocalSellOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3030',
        dealId: null,
      });

      expect(local.order?.status).toBe('PENDING');
      expect(engine.gateway.listOrders()).toHaveLength(0);

      if (!local.order) throw new Error('missing order');
      const placed = await engine.orderService.placeExistingOrder(local.order);

      expect(placed.success).toBe(true);
      expect(placed.order?.status).toBe('OPEN');
      expect(engine.gateway.listOrders()).toHaveLength(1);
    });

    it('should refuse to place an order that is not PENDING', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });
      if (!result.order) throw new Error('missing order');

      const again = await engine.orderService.placeExistingOrder(result.order);

      expect(again.success).toBe(false);
      expect(again.error).toBe('Order order-1 is OPEN, only PENDING orders can be placed');
    });
  });

  describe('getOrderStatus', () => {
    it('should merge fills from the exchange', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });
      if (!result.order) throw new Error('missing order');

      engine.gateway.fillOrder('1');
      const refreshed = await engine.orderService.getOrderStatus(result.order);

      expect(refreshed.status).toBe('FILLED');
      expect(refreshed.filledAmount.toString()).toBe('0.0332');
      expect(refreshed.averagePrice?.toString()).toBe('3000');
    });

    it('should yield identical state when called twice without exchange changes', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });
      if (!result.order) throw new Error('missing order');
      engine.gateway.fillOrder('1', '0.01');

      const first = (await engine.orderService.getOrderStatus(result.order)).toDict();
      const second = (await engine.orderService.getOrderStatus(result.order)).toDict();

      expect(second).toEqual(first);
      expect(second.status).toBe('PARTIALLY_FILLED');
    });

    it('should return the order unchanged when the exchange fails', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });
      if (!result.order) throw new Error('missing order');
      const before = result.order.toDict();
      engine.gateway.failNext('fetchOrder');

      const refreshed = await engine.orderService.getOrderStatus(result.order);

      expect(refreshed.toDict()).toEqual(before);
    });
  });

  describe('cancelOrder', () => {
    it('should cancel an open order on the exchange', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });
      if (!result.order) throw new Error('missing order');

      const cancel = await engine.orderService.cancelOrder(result.order, 'Manual');

      expect(cancel.success).toBe(true);
      expect(cancel.outcome).toBe('canceled');
      expect(cancel.order.status).toBe('CANCELED');
      expect(engine.gateway.listOrders()[0]?.status).toBe('canceled');
    });

    it('should cancel a PENDING order locally', async () => {
      const local = engine.orderService.createLocalSellOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3030',
        dealId: null,
      });
      if (!local.order) throw new Error('missing order');

      const cancel = await engine.orderService.cancelOrder(local.order, 'Not needed');

      expect(cancel.outcome).toBe('canceled');
      expect(cancel.order.errorMessage).toBe('Not needed');
      expect(engine.gateway.listOrders()).toHaveLength(0);
    });

    it('should treat a filled order as already final', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });
      if (!result.order) throw new Error('missing order');
      engine.gateway.fillOrder('1');

      const cancel = await engine.orderService.cancelOrder(result.order, 'Too late');

      expect(cancel.success).toBe(true);
      expect(cancel.outcome).toBe('already_final');
      expect(cancel.order.status).toBe('FILLED');
    });

    it('should report failure when the exchange keeps refusing', async () => {
      const result = await engine.orderService.createAndPlaceBuyOrder({
        symbol: 'ETHUSDT',
        amount: '0.0332',
        price: '3000',
        dealId: null,
      });
      if (!result.order) throw new Error('missing order');
      engine.gateway.failNext('cancelOrder', 3, new ExchangeError('network', 'timeout'));

      const cancel = await engine.orderService.cancelOrder(result.order, 'Manual');

      expect(cancel).toMatchObject({ success: false, outcome: 'failed', error: 'timeout' });
      expect(cancel.order.status).toBe('OPEN');
      expect(cancel.order.errorMessage).toBe('timeout');
    });
  });

  describe('emergencyCancelAll', () => {
    it('should cancel open orders of one symbol', async () => {
      await engine.orderService.createAndPlaceBuyOrder({ symbol: 'ETHUSDT', amount: '0.01', price: '2900', dealId: null });
      await engine.orderService.createAndPlaceBuyOrder({ symbol: 'ETHUSDT', amount: '0.01', price: '2800', dealId: null });

      const results = await engine.orderService.emergencyCancelAll('ETHUSDT');

      expect(results.map((r) => r.outcome)).toEqual(['canceled', 'canceled']);
      expect(engine.orderService.getOpenOrders()).toHaveLength(0);
    });
  });

  describe('cancel while placing', () => {
    const request = { symbol: 'ETHUSDT', amount: '0.0332', price: '3000', dealId: null };

    async function cancelLocally(orderId: string): Promise<void> {
      const pending = engine.orderService.getOrder(orderId);
      if (!pending) throw new Error(`missing ${orderId}`);
      await engine.orderService.cancelOrder(pending, 'Emergency cancel');
    }

    it('should stop retrying once the order was canceled between attempts', async () => {
      const createOrder = vi.spyOn(engine.gateway, 'createOrder').mockImplementationOnce(async () => {
        await cancelLocally('order-1');
        throw new ExchangeError('network', 'socket hang up');
      });

      const result = await engine.orderService.createAndPlaceBuyOrder(request);

      expect(createOrder).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(false);
      expect(result.error).toBe('Order order-1 is CANCELED, placement aborted');
      expect(result.order?.status).toBe('CANCELED');
      expect(result.order?.retries).toBe(1);
      expect(engine.gateway.listOrders()).toHaveLength(0);
    });

    it('should not send a pending SELL that was canceled between attempts', async () => {
      const local = engine.orderService.createLocalSellOrder({ ...request, price: '3030' });
      if (!local.order) throw new Error('missing sell');
      const createOrder = vi.spyOn(engine.gateway, 'createOrder').mockImplementationOnce(async () => {
        await cancelLocally('order-1');
        throw new ExchangeError('network', 'socket hang up');
      });

      const result = await engine.orderService.placeExistingOrder(local.order);

      expect(createOrder).toHaveBeenCalledTimes(1);
      expect(result.error).toBe('Order order-1 is CANCELED, placement aborted');
      expect(engine.gateway.listOrders()).toHaveLength(0);
    });

    it('should withdraw an order the exchange accepted after the local cancel', async () => {
      const create = engine.gateway.createOrder.bind(engine.gateway);
      vi.spyOn(engine.gateway, 'createOrder').mockImplementationOnce(async (order) => {
        await cancelLocally('order-1');
        return create(order);
      });

      const result = await engine.orderService.createAndPlaceBuyOrder(request);

      expect(result.success).toBe(false);
      expect(result.error).toBe('Order order-1 was CANCELED before the exchange accepted it');
      expect(result.order?.status).toBe('CANCELED');
      expect(result.order?.exchangeId).toBe('1');
      expect(engine.gateway.listOrders().map((order) => order.status)).toEqual(['canceled']);
      expect(engine.gateway.getBalance('USDT').free.toString()).toBe('10000');
      expect(engine.gateway.getBalance('USDT').locked.toString()).toBe('0');
    });
  });
});
