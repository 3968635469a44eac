/**
 * Telegram Client
 *
 * Handles communication with Telegram Bot API.
 * Includes retry logic and rate limit handling.
 */

import TelegramBot from 'node-telegram-bot-api';
import { errorMessage } from '../errors.js';
import { logger, maskSecret } from '../logger.js';
import { sleep } from '../utils/retry.js';
import type { MessageSender } from './types.js';

export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
}

export class TelegramClient implements MessageSender {
  private bot: TelegramBot;
  private chatId: string;
  private retryAttempts: number;
  private retryDelayMs: number;

  constructor(config: TelegramClientConfig) {
    this.bot = new TelegramBot(config.botToken);
    this.chatId = config.chatId;
    this.retryAttempts = config.retryAttempts;
    this.retryDelayMs = config.retryDelayMs;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a message with retry logic
   * Returns true if message was sent successfully
   */
  public async sendMessage(text: string): Promise<boolean> {
    let lastError: string | null = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        await this.bot.sendMessage(this.chatId, text, {
          parse_mode: 'Markdown',
          disable_web_page_preview: true,
        });

        logger.debug('Telegram message sent successfully', { attempt });
        return true;
      } catch (error) {
        lastError = errorMessage(error);

        const retryAfterMs = rateLimitRetryAfter(error);
        if (retryAfterMs !== null) {
          const waitTime = retryAfterMs > 0 ? retryAfterMs : this.retryDelayMs * attempt;
          logger.warn('Telegram rate limit hit, waiting...', { attempt, waitTime });
          await sleep(waitTime);
        } else if (attempt < this.retryAttempts) {
          logger.warn('Telegram send failed, retrying...', { attempt, error: lastError });
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }

    logger.error('Failed to send Telegram message after all retries', { error: lastError });
    return false;
  }

  /**
   * Verify the bot token and chat ID are valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', { username: me.username });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', { error: errorMessage(error) });
      return false;
    }
  }
}

/**
 * For a 429 response: retry_after in ms, 0 when absent. null otherwise.
 */
function rateLimitRetryAfter(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;
  const response: unknown = Reflect.get(error, 'response');
  if (typeof response !== 'object' || response === null) return null;
  if (Reflect.get(response, 'statusCode') !== 429) return null;

  const body: unknown = Reflect.get(response, 'body');
  if (typeof body !== 'object' || body === null) return 0;
  const parameters: unknown = Reflect.get(body, 'parameters');
  if (typeof parameters !== 'object' || parameters === null) return 0;
  const retryAfter: unknown = Reflect.get(parameters, 'retry_after');
  return typeof retryAfter === 'number' ? retryAfter * 1000 : 0;
}
