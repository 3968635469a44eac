/**
 * Tests for StalenessPolicy
 */

import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import { StalenessPolicy } from '../../src/monitoring/StalenessPolicy.js';
import { Order } from '../../src/orders/Order.js';
import { MINUTE, START_TIME } from '../support.js';

const order = new Order({
  id: 'order-1',
  symbol: 'ETHUSDT',
  side: 'BUY',
  type: 'LIMIT',
  price: new Decimal('3000'),
  amount: new Decimal('0.0332'),
  createdAt: START_TIME,
});

describe('StalenessPolicy', () => {
  const policy = StalenessPolicy.fromConfig({ maxAgeMinutes: 15, maxPriceDeviationPercent: 3 });

  it('should not fire for a young order at the market', () => {
    expect(policy.evaluate(order, { now: START_TIME + 15 * MINUTE, marketPrice: new Decimal('3000') })).toEqual([]);
  });

  it('should fire on age', () => {
    expect(policy.evaluate(order, { now: START_TIME + 20 * MINUTE, marketPrice: null })).toEqual([
      { kind: 'age', detail: 'Order age 20.0m exceeds 15m' },
    ]);
  });

  it('should fire when the market ran away from the order', () => {
    const reasons = policy.evaluate(order, { now: START_TIME + 2 * MINUTE, marketPrice: new Decimal('3100') });

    expect(reasons).toEqual([
      { kind: 'price_deviation', detail: 'Market 3100 is 3.33% above order price 3000' },
    ]);
  });

  it('should not fire when the market fell below the order', () => {
    expect(policy.evaluate(order, { now: START_TIME, marketPrice: new Decimal('2500') })).toEqual([]);
  });

  it('should report every predicate that fires', () => {
    const reasons = policy.evaluate(order, { now: START_TIME + 30 * MINUTE, marketPrice: new Decimal('3100') });

    expect(reasons.map((reason) => reason.kind)).toEqual(['age', 'price_deviation']);
  });

  it('should only need the market price when a predicate uses it', () => {
    expect(policy.needsMarketPrice).toBe(true);
    expect(new StalenessPolicy([StalenessPolicy.ageBased(15)]).needsMarketPrice).toBe(false);
  });
});
