/**
 * Message Formatter
 *
 * Formats deal lifecycle events for Telegram (legacy Markdown).
 */

import type { Deal } from '../deals/Deal.js';
import type { ExecutionReport } from '../execution/types.js';
import type { Order } from '../orders/Order.js';

export function formatDealOpenedMessage(deal: Deal, timestamp: number): string {
  return `🟢 *Deal opened*

• Pair: \`${deal.symbol}\`
• Deal: \`${deal.id}\`
• BUY: \`${formatOrder(deal.buyOrder)}\`
• SELL: \`${formatOrder(deal.sellOrder)}\`
• Time: \`${formatTime(timestamp)}\``;
}

export function formatDealClosedMessage(deal: Deal): string {
  const profit = deal.profit;
  const emoji = profit !== null && profit.isNegative() ? '🔻' : '✅';
  return `${emoji} *Deal closed*

• Pair: \`${deal.symbol}\`
• Deal: \`${deal.id}\`
• Profit: \`${profit?.toString() ?? 'n/a'} ${deal.pair.quoteCurrency}\`
• Time: \`${formatTime(deal.closedAt ?? deal.updatedAt)}\``;
}

export function formatDealCanceledMessage(deal: Deal, reason: string): string {
  return `⚪ *Deal canceled*

• Pair: \`${deal.symbol}\`
• Deal: \`${deal.id}\`
• Reason: ${escapeMarkdown(reason)}
• Time: \`${formatTime(deal.closedAt ?? deal.updatedAt)}\``;
}

export function formatBuyOrderReplacedMessage(deal: Deal, previous: Order, replacement: Order): string {
  return `🔁 *Stale BUY recreated*

• Pair: \`${deal.symbol}\`
• Deal: \`${deal.id}\`
• Old: \`${formatOrder(previous)}\`
• New: \`${formatOrder(replacement)}\`
• Recreations: \`${deal.recreationCount}\``;
}

export function formatExecutionFailedMessage(report: ExecutionReport, timestamp: number): string {
  const lines = [
    '❗ *Execution failed*',
    '',
    `• Pair: \`${report.symbol}\``,
    `• Code: \`${report.errorCode ?? 'UNKNOWN'}\``,
    `• Error: ${escapeMarkdown(report.error ?? 'unknown error')}`,
  ];
  if (report.dealId !== null) {
    lines.push(`• Deal: \`${report.dealId}\``);
  }
  if (report.emergencyCancel !== null) {
    lines.push(`• Emergency cancel: \`${report.emergencyCancel.outcome}\``);
  }
  lines.push(`• Time: \`${formatTime(timestamp)}\``);
  return lines.join('\n');
}

/**
 * Format an error notification
 */
export function formatErrorMessage(errorType: string, message: string, timestamp: number): string {
  return `❗ *ENGINE ERROR*

• Source: \`${errorType}\`
• Message: ${escapeMarkdown(message)}
• Time: \`${formatTime(timestamp)}\`

_Needs attention._`;
}

export function formatStartupMessage(exchange: string, symbols: string[], timestamp: number): string {
  return `🚀 *Deal engine started*

• Exchange: \`${exchange}\`
• Pairs: \`${symbols.join(', ')}\`
• Time: \`${formatTime(timestamp)}\``;
}

export function formatShutdownMessage(reason: string, timestamp: number): string {
  return `🛑 *Deal engine stopped*

• Reason: ${escapeMarkdown(reason)}
• Time: \`${formatTime(timestamp)}\``;
}

// ===========================================
// Helpers
// ===========================================

function formatOrder(order: Order | null): string {
  if (!order) return 'none';
  return `${order.amount.toString()} @ ${order.price.toString()} (${order.status})`;
}

function formatTime(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

/**
 * Escape Markdown special characters
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}
