/**
 * Deal Execution Engine
 *
 * Process entry point: starts the App and turns process signals into a
 * graceful stop. Open deals are left to the next run.
 */

import { App } from './app.js';
import { config } from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

const STATUS_LOG_INTERVAL_MS = 60_000;

const app = new App();
let statusTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Received ${signal}, stopping engine`);

  if (statusTimer) {
    clearInterval(statusTimer);
    statusTimer = null;
  }

  try {
    await app.stop(`Received ${signal}`);
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  shutdown('uncaughtException').catch(() => process.exit(1));
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

async function main(): Promise<void> {
  try {
    logger.info('Deal Execution Engine', {
      exchange: config.exchange.mode,
      testnet: config.exchange.mode === 'binance' ? config.exchange.testnet : undefined,
      symbols: config.trading.symbols,
    });

    await app.start();

    statusTimer = setInterval(() => {
      logger.debug('Application status', app.getStatus());
    }, STATUS_LOG_INTERVAL_MS);
  } catch (error) {
    logger.error('Failed to start application', { error: errorMessage(error) });
    process.exit(1);
  }
}

void main();
