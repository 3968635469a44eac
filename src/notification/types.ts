/**
 * Types for Notification Service
 */

/**
 * Configuration for Notification Service
 */
export interface NotificationServiceConfig {
  enabled: boolean;
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
}

/**
 * Anything that can deliver a formatted message
 */
export interface MessageSender {
  sendMessage(text: string): Promise<boolean>;
  verifyConnection(): Promise<boolean>;
}

export type NotificationKind =
  | 'dealOpened'
  | 'dealClosed'
  | 'dealCanceled'
  | 'buyOrderReplaced'
  | 'executionFailed'
  | 'error'
  | 'startup'
  | 'shutdown';

export interface NotificationEvents {
  sent: [NotificationKind];
  error: [Error];
}
