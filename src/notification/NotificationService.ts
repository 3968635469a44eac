/**
 * Notification Service
 *
 * Output layer for deal lifecycle notifications. Sends are best effort:
 * a failed message is logged and reported through the 'error' event,
 * never thrown back into the engine.
 */

import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import type { Deal } from '../deals/Deal.js';
import type { ExecutionReport } from '../execution/types.js';
import type { Order } from '../orders/Order.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { TelegramClient } from './TelegramClient.js';
import {
  formatBuyOrderReplacedMessage,
  formatDealCanceledMessage,
  formatDealClosedMessage,
  formatDealOpenedMessage,
  formatErrorMessage,
  formatExecutionFailedMessage,
  formatShutdownMessage,
  formatStartupMessage,
} from './formatter.js';
import type { MessageSender, NotificationEvents, NotificationKind, NotificationServiceConfig } from './types.js';

export class NotificationService extends EventEmitter<NotificationEvents> {
  private readonly client: MessageSender | null;
  private readonly clock: Clock;

  constructor(config: NotificationServiceConfig, client?: MessageSender, clock: Clock = systemClock) {
    super();
    this.clock = clock;

    if (!config.enabled) {
      this.client = null;
      logger.info('Notification Service disabled');
      return;
    }

    this.client =
      client ??
      new TelegramClient({
        botToken: config.botToken,
        chatId: config.chatId,
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
      });

    logger.info('Notification Service initialized');
  }

  get isEnabled(): boolean {
    return this.client !== null;
  }

  /**
   * Verify Telegram connection on startup
   */
  public async verifyConnection(): Promise<boolean> {
    if (!this.client) return true;
    return this.client.verifyConnection();
  }

  public notifyDealOpened(deal: Deal): Promise<boolean> {
    return this.send('dealOpened', formatDealOpenedMessage(deal, this.clock()));
  }

  public notifyDealClosed(deal: Deal): Promise<boolean> {
    return this.send('dealClosed', formatDealClosedMessage(deal));
  }

  public notifyDealCanceled(deal: Deal, reason: string): Promise<boolean> {
    return this.send('dealCanceled', formatDealCanceledMessage(deal, reason));
  }

  public notifyBuyOrderReplaced(deal: Deal, previous: Order, replacement: Order): Promise<boolean> {
    return this.send('buyOrderReplaced', formatBuyOrderReplacedMessage(deal, previous, replacement));
  }

  public notifyExecutionFailed(report: ExecutionReport): Promise<boolean> {
    return this.send('executionFailed', formatExecutionFailedMessage(report, this.clock()));
  }

  /**
   * Send startup notification
   */
  public sendStartupNotification(exchange: string, symbols: string[]): Promise<boolean> {
    return this.send('startup', formatStartupMessage(exchange, symbols, this.clock()));
  }

  /**
   * Send shutdown notification
   */
  public sendShutdownNotification(reason: string): Promise<boolean> {
    return this.send('shutdown', formatShutdownMessage(reason, this.clock()));
  }

  /**
   * Send error notification
   */
  public sendErrorNotification(errorType: string, message: string): Promise<boolean> {
    logger.warn('Sending error notification', { errorType, message });
    return this.send('error', formatErrorMessage(errorType, message, this.clock()));
  }

  private async send(kind: NotificationKind, text: string): Promise<boolean> {
    if (!this.client) {
      logger.debug('Notification skipped, service disabled', { kind });
      return false;
    }

    const success = await this.client.sendMessage(text);
    if (success) {
      logger.info('Notification sent', { kind });
      this.emit('sent', kind);
    } else {
      logger.error('Failed to send notification', { kind });
      this.emit('error', new Error(`Failed to send ${kind} notification`));
    }
    return success;
  }
}
