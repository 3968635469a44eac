/**
 * Tests for DealCompletionMonitor
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DealCompletionMonitor } from '../../src/monitoring/DealCompletionMonitor.js';
import { MINUTE, createEngine, scenarioStrategy, type Engine } from '../support.js';

describe('DealCompletionMonitor', () => {
  let engine: Engine;
  let monitor: DealCompletionMonitor;

  beforeEach(async () => {
    engine = createEngine();
    monitor = new DealCompletionMonitor({ enabled: true, intervalMs: MINUTE }, engine.dealService, engine.time.clock);
    await engine.executionService.executeTradingStrategy(engine.pair, scenarioStrategy());
  });

  it('should drive a deal from filled BUY to closed', async () => {
    const checked = vi.fn();
    monitor.on('completionChecked', checked);

    engine.gateway.fillOrder('1');
    const placed = await monitor.checkDeals();
    engine.gateway.setPrice('ETHUSDT', '3030');
    const closed = await monitor.checkDeals();

    expect(placed).toEqual({ sellsPlaced: 1, dealsClosed: 0, errors: 0 });
    expect(closed).toEqual({ sellsPlaced: 0, dealsClosed: 1, errors: 0 });
    expect(engine.dealService.getDeal('deal-1')?.profit?.toString()).toBe('0.795804');
    expect(checked).toHaveBeenCalledTimes(2);
  });

  it('should do nothing while the BUY rests', async () => {
    expect(await monitor.checkDeals()).toEqual({ sellsPlaced: 0, dealsClosed: 0, errors: 0 });
    expect(engine.dealService.getDeal('deal-1')?.sellOrder?.status).toBe('PENDING');
  });
});
