export { NotificationService } from './NotificationService.js';
export { TelegramClient } from './TelegramClient.js';
export {
  formatDealOpenedMessage,
  formatDealClosedMessage,
  formatDealCanceledMessage,
  formatBuyOrderReplacedMessage,
  formatExecutionFailedMessage,
  formatErrorMessage,
  formatStartupMessage,
  formatShutdownMessage,
  escapeMarkdown,
} from './formatter.js';
export type {
  NotificationServiceConfig,
  MessageSender,
  NotificationKind,
  NotificationEvents,
} from './types.js';
