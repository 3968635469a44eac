/**
 * Order
 *
 * State machine for one exchange order:
 * PENDING → OPEN → (PARTIALLY_FILLED) → FILLED | CANCELED | FAILED
 *
 * updateFromExchange() is the only path that advances fill state. It is
 * idempotent: stale, foreign or post-terminal snapshots are ignored, and
 * neither filledAmount nor status ever move backwards.
 */

import { Decimal } from 'decimal.js';
import { OrderStateError, ValidationError } from '../errors.js';
import { optionalDecimal } from '../utils/decimal.js';
import type { OrderSnapshot } from '../exchange/types.js';
import { TERMINAL_ORDER_STATUSES } from './types.js';
import type { OrderRecord, OrderSide, OrderStatus, OrderType } from './types.js';

const STATUS_RANK: Record<OrderStatus, number> = {
  PENDING: 0,
  OPEN: 1,
  PARTIALLY_FILLED: 2,
  FILLED: 3,
  CANCELED: 3,
  FAILED: 3,
};

export interface OrderProps {
  id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  price: Decimal;
  amount: Decimal;
  createdAt: number;
  filledAmount?: Decimal;
  averagePrice?: Decimal | null;
  fees?: Decimal;
  status?: OrderStatus;
  exchangeId?: string | null;
  dealId?: string | null;
  updatedAt?: number;
  closedAt?: number | null;
  lastSnapshotAt?: number | null;
  retries?: number;
  errorMessage?: string | null;
}

export class Order {
  readonly id: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly createdAt: number;

  private _price: Decimal;
  private _amount: Decimal;
  private _filledAmount: Decimal;
  private _averagePrice: Decimal | null;
  private _fees: Decimal;
  private _status: OrderStatus;
  private _exchangeId: string | null;
  private _dealId: string | null;
  private _updatedAt: number;
  private _closedAt: number | null;
  private _lastSnapshotAt: number | null;
  private _retries: number;
  private _errorMessage: string | null;

  constructor(props: OrderProps) {
    if (props.amount.lte(0)) {
      throw new ValidationError(`Order amount must be positive, got ${props.amount.toString()}`);
    }
    if (props.type === 'LIMIT' && props.price.lte(0)) {
      throw new ValidationError(`Limit order price must be positive, got ${props.price.toString()}`);
    }

    const filled = props.filledAmount ?? new Decimal(0);
    if (filled.lt(0) || filled.gt(props.amount)) {
      throw new ValidationError(
        `Filled amount ${filled.toString()} outside [0, ${props.amount.toString()}]`
      );
    }

    this.id = props.id;
    this.symbol = props.symbol;
    this.side = props.side;
    this.type = props.type;
    this.createdAt = props.createdAt;
    this._price = props.price;
    this._amount = props.amount;
    this._filledAmount = filled;
    this._averagePrice = props.averagePrice ?? null;
    this._fees = props.fees ?? new Decimal(0);
    this._status = props.status ?? 'PENDING';
    this._exchangeId = props.exchangeId ?? null;
    this._dealId = props.dealId ?? null;
    this._updatedAt = props.updatedAt ?? props.createdAt;
    this._closedAt = props.closedAt ?? null;
    this._lastSnapshotAt = props.lastSnapshotAt ?? null;
    this._retries = props.retries ?? 0;
    this._errorMessage = props.errorMessage ?? null;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get price(): Decimal {
    return this._price;
  }

  get amount(): Decimal {
    return this._amount;
  }

  get filledAmount(): Decimal {
    return this._filledAmount;
  }

  get remainingAmount(): Decimal {
    return this._amount.minus(this._filledAmount);
  }

  get averagePrice(): Decimal | null {
    return this._averagePrice;
  }

  get fees(): Decimal {
    return this._fees;
  }

  get status(): OrderStatus {
    return this._status;
  }

  get exchangeId(): string | null {
    return this._exchangeId;
  }

  get dealId(): string | null {
    return this._dealId;
  }

  get updatedAt(): number {
    return this._updatedAt;
  }

  get closedAt(): number | null {
    return this._closedAt;
  }

  get lastSnapshotAt(): number | null {
    return this._lastSnapshotAt;
  }

  get retries(): number {
    return this._retries;
  }

  get errorMessage(): string | null {
    return this._errorMessage;
  }

  get isTerminal(): boolean {
    return TERMINAL_ORDER_STATUSES.includes(this._status);
  }

  /** Resting on the exchange */
  get isActive(): boolean {
    return this._status === 'OPEN' || this._status === 'PARTIALLY_FILLED';
  }

  get isPending(): boolean {
    return this._status === 'PENDING';
  }

  get isFilled(): boolean {
    return this._status === 'FILLED';
  }

  /** Quote value at the limit price */
  get notional(): Decimal {
    return this._price.mul(this._amount);
  }

  /** Quote value actually executed */
  get executedValue(): Decimal {
    return (this._averagePrice ?? this._price).mul(this._filledAmount);
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  linkToDeal(dealId: string, timestamp: number): void {
    if (this._dealId !== null && this._dealId !== dealId) {
      throw new OrderStateError(`Order ${this.id} already belongs to deal ${this._dealId}`);
    }
    this._dealId = dealId;
    this._updatedAt = timestamp;
  }

  recordAttempt(timestamp: number): void {
    this._retries += 1;
    this._updatedAt = timestamp;
  }

  /**
   * Exchange id of a placement that completed after the order had already
   * left PENDING locally. Status is not changed.
   */
  recordLateExchangeId(exchangeId: string, timestamp: number): void {
    if (this._exchangeId !== null) {
      throw new OrderStateError(`Order ${this.id} already has exchange id ${this._exchangeId}`);
    }
    if (exchangeId.length === 0) {
      throw new ValidationError('Exchange id must not be empty');
    }
    this._exchangeId = exchangeId;
    this._updatedAt = timestamp;
  }

  /**
   * PENDING → OPEN once the exchange accepted the order
   */
  markAsPlaced(exchangeId: string, timestamp: number): void {
    if (this._status !== 'PENDING') {
      throw new OrderStateError(`Cannot place order ${this.id} in status ${this._status}`);
    }
    if (exchangeId.length === 0) {
      throw new ValidationError('Exchange id must not be empty');
    }
    this._exchangeId = exchangeId;
    this._status = 'OPEN';
    this._errorMessage = null;
    this._updatedAt = timestamp;
  }

  /**
   * PENDING → FAILED after placement gave up
   */
  markAsFailed(message: string, timestamp: number): void {
    if (this._status !== 'PENDING') {
      throw new OrderStateError(`Cannot fail order ${this.id} in status ${this._status}`);
    }
    this._status = 'FAILED';
    this._errorMessage = message;
    this._updatedAt = timestamp;
    this._closedAt = timestamp;
  }

  /**
   * Record an error without changing status
   */
  recordError(message: string, timestamp: number): void {
    this._errorMessage = message;
    this._updatedAt = timestamp;
  }

  /**
   * Merge an exchange snapshot. Returns whether anything changed.
   */
  updateFromExchange(snapshot: OrderSnapshot): boolean {
    if (this.isTerminal) {
      return false;
    }
    if (this._exchangeId === null || snapshot.exchangeId !== this._exchangeId) {
      return false;
    }
    if (this._lastSnapshotAt !== null && snapshot.timestamp < this._lastSnapshotAt) {
      return false;
    }

    this._lastSnapshotAt = snapshot.timestamp;

    let filled = Decimal.max(this._filledAmount, snapshot.filled);
    if (snapshot.status === 'closed') {
      filled = this._amount;
    }
    filled = Decimal.min(filled, this._amount);

    const target = this.mapExchangeStatus(snapshot, filled);
    const status = STATUS_RANK[target] >= STATUS_RANK[this._status] ? target : this._status;

    const averagePrice = snapshot.averagePrice ?? this._averagePrice;
    const fees =
      snapshot.fee !== null && snapshot.fee.gt(this._fees) ? snapshot.fee : this._fees;

    const changed =
      status !== this._status ||
      !filled.eq(this._filledAmount) ||
      !fees.eq(this._fees) ||
      !sameDecimal(averagePrice, this._averagePrice);

    if (!changed) {
      return false;
    }

    this._status = status;
    this._filledAmount = filled;
    this._averagePrice = averagePrice;
    this._fees = fees;
    this._updatedAt = snapshot.timestamp;
    if (this.isTerminal) {
      this._closedAt = snapshot.timestamp;
      if (status === 'FAILED') {
        this._errorMessage = 'Rejected by exchange';
      }
    }
    return true;
  }

  /**
   * Cancel locally. No-op (returns false) once terminal.
   */
  cancel(reason: string, timestamp: number): boolean {
    if (this.isTerminal) {
      return false;
    }
    this._status = 'CANCELED';
    this._errorMessage = reason;
    this._updatedAt = timestamp;
    this._closedAt = timestamp;
    return true;
  }

  /**
   * Change price/amount of an order that has not reached the exchange yet
   */
  reprice(price: Decimal, amount: Decimal, timestamp: number): void {
    if (this._status !== 'PENDING') {
      throw new OrderStateError(`Cannot reprice order ${this.id} in status ${this._status}`);
    }
    if (price.lte(0) || amount.lte(0)) {
      throw new ValidationError('Price and amount must be positive');
    }
    this._price = price;
    this._amount = amount;
    this._updatedAt = timestamp;
  }

  private mapExchangeStatus(snapshot: OrderSnapshot, filled: Decimal): OrderStatus {
    switch (snapshot.status) {
      case 'closed':
        return 'FILLED';
      case 'canceled':
      case 'expired':
        return 'CANCELED';
      case 'rejected':
        return 'FAILED';
      case 'open':
        return filled.gt(0) ? 'PARTIALLY_FILLED' : 'OPEN';
    }
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  toDict(): OrderRecord {
    return {
      id: this.id,
      symbol: this.symbol,
      side: this.side,
      type: this.type,
      price: this._price.toString(),
      amount: this._amount.toString(),
      filled_amount: this._filledAmount.toString(),
      average_price: this._averagePrice?.toString() ?? null,
      fees: this._fees.toString(),
      status: this._status,
      exchange_id: this._exchangeId,
      deal_id: this._dealId,
      created_at: this.createdAt,
      updated_at: this._updatedAt,
      closed_at: this._closedAt,
      last_snapshot_at: this._lastSnapshotAt,
      retries: this._retries,
      error_message: this._errorMessage,
    };
  }

  static fromDict(record: OrderRecord): Order {
    return new Order({
      id: record.id,
      symbol: record.symbol,
      side: record.side,
      type: record.type,
      price: new Decimal(record.price),
      amount: new Decimal(record.amount),
      filledAmount: new Decimal(record.filled_amount),
      averagePrice: optionalDecimal(record.average_price),
      fees: new Decimal(record.fees),
      status: record.status,
      exchangeId: record.exchange_id,
      dealId: record.deal_id,
      createdAt: record.created_at,
      updatedAt: record.updated_at,
      closedAt: record.closed_at,
      lastSnapshotAt: record.last_snapshot_at,
      retries: record.retries,
      errorMessage: record.error_message,
    });
  }

  /** Independent copy with identical state */
  clone(): Order {
    return Order.fromDict(this.toDict());
  }
}

function sameDecimal(a: Decimal | null, b: Decimal | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.eq(b);
}
