/**
 * Tests for OrderTimeoutService
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Decimal } from 'decimal.js';
import { OrderTimeoutService } from '../../src/monitoring/OrderTimeoutService.js';
import type { OrderTimeoutConfig, StalenessReason } from '../../src/monitoring/types.js';
import type { Deal } from '../../src/deals/Deal.js';
import type { Order } from '../../src/orders/Order.js';
import { MINUTE, createEngine, scenarioStrategy, type Engine } from '../support.js';

const AGED: StalenessReason[] = [{ kind: 'age', detail: 'Order age 20.0m exceeds 15m' }];

describe('OrderTimeoutService', () => {
  let engine: Engine;
  let deal: Deal;
  let buy: Order;

  function service(overrides: Partial<OrderTimeoutConfig> = {}): OrderTimeoutService {
    return new OrderTimeoutService(
      { maxRecreationsPerDeal: 3, minMinutesBetweenRecreations: 30, repriceFactor: 0.999, ...overrides },
      engine.orderService,
      engine.dealService,
      engine.gateway,
      engine.time.clock
    );
  }

  beforeEach(async () => {
    engine = createEngine();
    const report = await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());
    const opened = report.dealId ? engine.dealService.getDeal(report.dealId) : undefined;
    if (!opened?.buyOrder) throw new Error(report.error ?? 'deal not opened');
    deal = opened;
    buy = opened.buyOrder;
    engine.time.advance(20 * MINUTE);
  });

  it('should cancel and recreate below the market price', async () => {
    const result = await service().handleStaleOrder(buy, AGED, new Decimal('3000'));

    // floor(3000 * 0.999)
    expect(result.outcome).toBe('recreated');
    expect(result.detail).toBe('Recreated at 2997');
    expect(result.order.status).toBe('CANCELED');
    expect(result.replacement?.price.toString()).toBe('2997');
    expect(result.replacement?.amount.toString()).toBe('0.0332');
    expect(result.replacement?.exchangeId).toBe('2');
    expect(deal.buyOrder).toBe(result.replacement);
    expect(deal.recreationCount).toBe(1);
    // 2997 * 1.01
    expect(deal.sellOrder?.price.toString()).toBe('3026.97');
  });

  it('should fetch the ticker when no market price was given', async () => {
    engine.gateway.setPrice('ETHUSDT', '3100');

    const result = await service().handleStaleOrder(buy, AGED, null);

    expect(result.replacement?.price.toString()).toBe('3096.9');
  });

  it('should defer while the deal is in its recreation cooldown', async () => {
    const timeouts = service();
    const first = await timeouts.handleStaleOrder(buy, AGED, new Decimal('3000'));
    if (!first.replacement) throw new Error('not recreated');
    engine.time.advance(29 * MINUTE);

    const second = await timeouts.handleStaleOrder(first.replacement, AGED, new Decimal('3000'));

    expect(second).toEqual({
      outcome: 'deferred',
      order: first.replacement,
      replacement: null,
      detail: 'Recreation cooldown active',
    });
    expect(first.replacement.status).toBe('OPEN');
  });

  it('should cancel the deal once the recreation limit is reached', async () => {
    const result = await service({ maxRecreationsPerDeal: 0 }).handleStaleOrder(buy, AGED, new Decimal('3000'));

    expect(result.outcome).toBe('deal_canceled');
    expect(result.detail).toBe('Recreation limit 0 reached');
    expect(deal.status).toBe('CANCELED');
    expect(deal.sellOrder?.status).toBe('CANCELED');
  });

  it('should report an order that filled before the cancel', async () => {
    engine.gateway.fillOrder('1');

    const result = await service().handleStaleOrder(buy, AGED, new Decimal('3000'));

    expect(result.outcome).toBe('already_final');
    expect(result.order.status).toBe('FILLED');
    expect(deal.status).toBe('OPEN');
  });

  it('should not recreate a partially filled order', async () => {
    engine.gateway.fillOrder('1', '0.01');

    const result = await service().handleStaleOrder(buy, AGED, new Decimal('3000'));

    expect(result.outcome).toBe('canceled');
    expect(result.detail).toBe('Partially filled, not recreated');
    expect(result.order.filledAmount.toString()).toBe('0.01');
    expect(result.replacement).toBeNull();
  });

  it('should give up on the deal when the replacement cannot be placed', async () => {
    engine.gateway.failNext('createOrder', 3);

    const result = await service().handleStaleOrder(buy, AGED, new Decimal('3000'));

    expect(result.outcome).toBe('recreation_failed');
    expect(result.detail).toBe('Simulated createOrder failure');
    expect(deal.status).toBe('CANCELED');
  });

  it('should leave the order alone when the cancel fails', async () => {
    engine.gateway.failNext('cancelOrder', 3);

    const result = await service().handleStaleOrder(buy, AGED, new Decimal('3000'));

    expect(result.outcome).toBe('cancel_failed');
    expect(result.detail).toBe('Simulated cancelOrder failure');
    expect(buy.status).toBe('OPEN');
  });
});
