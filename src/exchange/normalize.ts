/**
 * Response Normalization
 *
 * Converts raw exchange payloads and library errors into OrderSnapshot
 * and ExchangeError at the adapter boundary.
 */

import { Decimal } from 'decimal.js';
import { ExchangeError, errorMessage, type ExchangeErrorKind } from '../errors.js';
import type { OrderSide, OrderType } from '../orders/types.js';
import type { ExchangeOrderStatus, OrderSnapshot } from './types.js';

// ============================================================================
// Field access
// ============================================================================

function readField(source: object, key: string): unknown {
  return Reflect.get(source, key);
}

export function stringField(source: object, key: string): string | null {
  const value = readField(source, key);
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function numericField(source: object, key: string): Decimal | null {
  const value = stringField(source, key);
  if (value === null) return null;
  try {
    return new Decimal(value);
  } catch {
    return null;
  }
}

function requireString(source: object, key: string): string {
  const value = stringField(source, key);
  if (value === null) {
    throw new ExchangeError('unknown', `Malformed exchange response: missing ${key}`);
  }
  return value;
}

// ============================================================================
// Order payloads
// ============================================================================

const STATUS_MAP: Record<string, ExchangeOrderStatus> = {
  NEW: 'open',
  PENDING_NEW: 'open',
  PARTIALLY_FILLED: 'open',
  PENDING_CANCEL: 'open',
  FILLED: 'closed',
  CANCELED: 'canceled',
  EXPIRED: 'expired',
  EXPIRED_IN_MATCH: 'expired',
  REJECTED: 'rejected',
};

export function mapOrderStatus(raw: string): ExchangeOrderStatus {
  const status = STATUS_MAP[raw.toUpperCase()];
  if (!status) {
    throw new ExchangeError('unknown', `Unknown exchange order status: ${raw}`);
  }
  return status;
}

function parseSide(raw: string): OrderSide {
  const side = raw.toUpperCase();
  if (side === 'BUY' || side === 'SELL') {
    return side;
  }
  throw new ExchangeError('unknown', `Unknown order side: ${raw}`);
}

function parseType(raw: string | null): OrderType {
  return raw !== null && raw.toUpperCase() === 'MARKET' ? 'MARKET' : 'LIMIT';
}

/**
 * Normalize a Binance Spot order payload (order response or order query)
 *
 * @param feePercent - used to estimate the fee from the executed quote value
 */
export function normalizeBinanceOrder(
  raw: object,
  feePercent: Decimal,
  fallbackTimestamp: number
): OrderSnapshot {
  const amount = numericField(raw, 'origQty') ?? new Decimal(0);
  const filled = numericField(raw, 'executedQty') ?? new Decimal(0);
  const quoteFilled = numericField(raw, 'cummulativeQuoteQty');

  const averagePrice =
    quoteFilled !== null && filled.gt(0) ? quoteFilled.div(filled) : null;
  const fee = quoteFilled !== null ? quoteFilled.mul(feePercent).div(100) : null;

  const timestamp =
    numericField(raw, 'updateTime') ??
    numericField(raw, 'transactTime') ??
    numericField(raw, 'time');

  return {
    exchangeId: requireString(raw, 'orderId'),
    symbol: requireString(raw, 'symbol'),
    side: parseSide(requireString(raw, 'side')),
    type: parseType(stringField(raw, 'type')),
    status: mapOrderStatus(stringField(raw, 'status') ?? 'NEW'),
    price: numericField(raw, 'price') ?? new Decimal(0),
    amount,
    filled,
    averagePrice,
    fee,
    timestamp: timestamp !== null ? timestamp.toNumber() : fallbackTimestamp,
  };
}

// ============================================================================
// Errors
// ============================================================================

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
]);

export function classifyExchangeCode(code: number): ExchangeErrorKind {
  switch (code) {
    case -1003:
    case -1015:
    case 418:
    case 429:
      return 'rate_limit';
    case -1001:
    case -1006:
    case -1007:
      return 'network';
    case -2011:
    case -2013:
      return 'not_found';
  }
  if (code >= 500) return 'network';
  if (code < 0 || (code >= 400 && code < 500)) return 'rejected';
  return 'unknown';
}

/**
 * Convert anything thrown by an exchange library into an ExchangeError
 */
export function toExchangeError(error: unknown): ExchangeError {
  if (error instanceof ExchangeError) {
    return error;
  }
  if (typeof error !== 'object' || error === null) {
    return new ExchangeError('unknown', String(error));
  }

  const message =
    stringField(error, 'message') ?? stringField(error, 'msg') ?? errorMessage(error);
  const code = readField(error, 'code');

  if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) {
    return new ExchangeError('network', message);
  }

  const numericCode =
    typeof code === 'number' ? code : typeof code === 'string' ? Number(code) : NaN;
  if (Number.isInteger(numericCode) && numericCode !== 0) {
    return new ExchangeError(classifyExchangeCode(numericCode), message, numericCode);
  }

  // Axios error carrying an HTTP response
  const response = readField(error, 'response');
  if (typeof response === 'object' && response !== null) {
    const status = readField(response, 'status');
    if (typeof status === 'number') {
      return new ExchangeError(classifyExchangeCode(status), `HTTP ${status}: ${message}`, status);
    }
  }

  return new ExchangeError('unknown', message);
}
