/**
 * Engine Errors
 *
 * Error taxonomy shared by every service. Public entry points convert
 * these into typed result objects instead of letting them escape.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INSUFFICIENT_BALANCE'
  | 'EXCHANGE_ERROR'
  | 'PARTIAL_FAILURE'
  | 'ORDER_STATE_ERROR'
  | 'DEAL_STATE_ERROR';

export class EngineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed input, rejected before any side effect
 */
export class ValidationError extends EngineError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
  }
}

export type ExchangeErrorKind =
  | 'network'
  | 'rate_limit'
  | 'rejected'
  | 'not_found'
  | 'unknown';

/**
 * Failure reported by (or while talking to) the exchange
 */
export class ExchangeError extends EngineError {
  readonly kind: ExchangeErrorKind;
  readonly exchangeCode: number | null;

  constructor(kind: ExchangeErrorKind, message: string, exchangeCode: number | null = null) {
    super('EXCHANGE_ERROR', message);
    this.kind = kind;
    this.exchangeCode = exchangeCode;
  }

  get retryable(): boolean {
    return this.kind === 'network' || this.kind === 'rate_limit' || this.kind === 'unknown';
  }
}

/**
 * BUY was placed but a later step of the trade failed
 */
export class PartialFailureError extends EngineError {
  readonly buyOrderId: string;

  constructor(buyOrderId: string, message: string) {
    super('PARTIAL_FAILURE', message);
    this.buyOrderId = buyOrderId;
  }
}

export class OrderStateError extends EngineError {
  constructor(message: string) {
    super('ORDER_STATE_ERROR', message);
  }
}

export class DealStateError extends EngineError {
  constructor(message: string) {
    super('DEAL_STATE_ERROR', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof ExchangeError) {
    return error.retryable;
  }
  // Engine errors other than exchange failures are deterministic
  return !(error instanceof EngineError);
}
