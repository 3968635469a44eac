/**
 * Tests for App wiring
 */

import { describe, it, expect } from 'vitest';
import { App } from '../src/app.js';
import { config, type Config } from '../src/config.js';

function paperConfig(): Config {
  return {
    ...config,
    exchange: { ...config.exchange, mode: 'paper' },
    paper: { marketsFile: 'paper-markets.json' },
    trading: { ...config.trading, symbols: ['ETHUSDT', 'BTCUSDT'] },
    telegram: { ...config.telegram, enabled: false },
    dashboard: { ...config.dashboard, enabled: false },
  };
}

describe('App', () => {
  it('should start and stop against the paper exchange', async () => {
    const app = new App(paperConfig());

    await app.start();
    const running = app.getStatus();
    await app.stop('Test finished');

    expect(running).toMatchObject({
      isRunning: true,
      exchange: 'paper',
      openDeals: 0,
      openOrders: 0,
      dashboardClients: 0,
    });
    expect(running.monitors.map((monitor) => monitor.name)).toEqual([
      'Buy order monitor',
      'Order sync monitor',
      'Deal completion monitor',
    ]);
    expect(app.getStatus().isRunning).toBe(false);
    expect(app.getStatus().monitors.every((monitor) => !monitor.running)).toBe(true);
  });

  it('should require credentials for the live exchange', () => {
    const live: Config = {
      ...paperConfig(),
      exchange: { mode: 'binance', apiKey: '', apiSecret: '', testnet: true },
    };

    expect(() => new App(live)).toThrow(
      'BINANCE_API_KEY and BINANCE_API_SECRET are required when EXCHANGE_MODE=binance'
    );
  });
});
