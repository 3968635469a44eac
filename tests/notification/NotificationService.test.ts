/**
 * Tests for NotificationService
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NotificationService } from '../../src/notification/NotificationService.js';
import type { MessageSender, NotificationServiceConfig } from '../../src/notification/types.js';
import { START_TIME, manualClock } from '../support.js';

const config: NotificationServiceConfig = {
  enabled: true,
  botToken: 'test-token',
  chatId: 'test-chat',
  retryAttempts: 3,
  retryDelayMs: 0,
};

describe('NotificationService', () => {
  let sendMessage: ReturnType<typeof vi.fn>;
  let sender: MessageSender;

  beforeEach(() => {
    sendMessage = vi.fn().mockResolvedValue(true);
    sender = { sendMessage, verifyConnection: vi.fn().mockResolvedValue(true) };
  });

  it('should send through the sender and emit sent', async () => {
    const service = new NotificationService(config, sender, manualClock().clock);
    const sent = vi.fn();
    service.on('sent', sent);

    const result = await service.sendShutdownNotification('SIGTERM');

    expect(result).toBe(true);
    expect(sendMessage).toHaveBeenCalledWith(
      '🛑 *Deal engine stopped*\n\n• Reason: SIGTERM\n• Time: `2023-11-14T22:13:20.000Z`'
    );
    expect(sent).toHaveBeenCalledWith('shutdown');
  });

  it('should report a failed send without throwing', async () => {
    sendMessage.mockResolvedValue(false);
    const service = new NotificationService(config, sender, () => START_TIME);
    const errors = vi.fn();
    service.on('error', errors);

    const result = await service.sendErrorNotification('Monitor', 'ticker down');

    expect(result).toBe(false);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0]?.[0]).toEqual(new Error('Failed to send error notification'));
  });

  it('should skip every send when disabled', async () => {
    const service = new NotificationService({ ...config, enabled: false }, sender);

    expect(service.isEnabled).toBe(false);
    expect(await service.verifyConnection()).toBe(true);
    expect(await service.sendStartupNotification('paper', ['ETHUSDT'])).toBe(false);
    expect(sendMessage).not.toHaveBeenCalled();
  });

  it('should delegate the connection check', async () => {
    const service = new NotificationService(config, sender);

    expect(await service.verifyConnection()).toBe(true);
    expect(sender.verifyConnection).toHaveBeenCalledTimes(1);
  });
});
