/**
 * Deal
 *
 * One trade cycle: a BUY order and the SELL order that takes its profit.
 * A deal holds at most one of each; the BUY can only be swapped once the
 * previous one is dead (stale order recreation).
 */

import type { Decimal } from 'decimal.js';
import { DealStateError, ValidationError } from '../errors.js';
import { optionalDecimal } from '../utils/decimal.js';
import type { CurrencyPair } from '../market/types.js';
import type { Order } from '../orders/Order.js';
import type { DealRecord, DealStatus } from './types.js';

export interface DealProps {
  id: string;
  pair: CurrencyPair;
  createdAt: number;
  status?: DealStatus;
  buyOrder?: Order | null;
  sellOrder?: Order | null;
  profit?: Decimal | null;
  updatedAt?: number;
  closedAt?: number | null;
  recreationCount?: number;
  lastRecreatedAt?: number | null;
}

export class Deal {
  readonly id: string;
  readonly pair: CurrencyPair;
  readonly createdAt: number;

  private _status: DealStatus;
  private _buyOrder: Order | null;
  private _sellOrder: Order | null;
  private _profit: Decimal | null;
  private _updatedAt: number;
  private _closedAt: number | null;
  private _recreationCount: number;
  private _lastRecreatedAt: number | null;

  constructor(props: DealProps) {
    this.id = props.id;
    this.pair = props.pair;
    this.createdAt = props.createdAt;
    this._status = props.status ?? 'OPEN';
    this._buyOrder = props.buyOrder ?? null;
    this._sellOrder = props.sellOrder ?? null;
    this._profit = props.profit ?? null;
    this._updatedAt = props.updatedAt ?? props.createdAt;
    this._closedAt = props.closedAt ?? null;
    this._recreationCount = props.recreationCount ?? 0;
    this._lastRecreatedAt = props.lastRecreatedAt ?? null;
  }

  get symbol(): string {
    return this.pair.symbol;
  }

  get status(): DealStatus {
    return this._status;
  }

  get isOpen(): boolean {
    return this._status === 'OPEN';
  }

  get buyOrder(): Order | null {
    return this._buyOrder;
  }

  get sellOrder(): Order | null {
    return this._sellOrder;
  }

  get profit(): Decimal | null {
    return this._profit;
  }

  get updatedAt(): number {
    return this._updatedAt;
  }

  get closedAt(): number | null {
    return this._closedAt;
  }

  get recreationCount(): number {
    return this._recreationCount;
  }

  get lastRecreatedAt(): number | null {
    return this._lastRecreatedAt;
  }

  get hasActiveOrders(): boolean {
    return Boolean(this._buyOrder?.isActive || this._sellOrder?.isActive);
  }

  get orders(): Order[] {
    const orders: Order[] = [];
    if (this._buyOrder) orders.push(this._buyOrder);
    if (this._sellOrder) orders.push(this._sellOrder);
    return orders;
  }

  /**
   * Link the BUY and SELL of this deal
   */
  attachOrders(buyOrder: Order, sellOrder: Order, timestamp: number): void {
    this.assertOpen('attach orders to');
    if (buyOrder.side !== 'BUY' || sellOrder.side !== 'SELL') {
      throw new ValidationError('attachOrders expects a BUY and a SELL order');
    }
    for (const order of [buyOrder, sellOrder]) {
      if (order.symbol !== this.symbol) {
        throw new ValidationError(`Order ${order.id} is for ${order.symbol}, deal is ${this.symbol}`);
      }
    }
    if (this._buyOrder && this._buyOrder.id !== buyOrder.id) {
      throw new DealStateError(`Deal ${this.id} already has BUY order ${this._buyOrder.id}`);
    }
    if (this._sellOrder && this._sellOrder.id !== sellOrder.id) {
      throw new DealStateError(`Deal ${this.id} already has SELL order ${this._sellOrder.id}`);
    }

    buyOrder.linkToDeal(this.id, timestamp);
    sellOrder.linkToDeal(this.id, timestamp);
    this._buyOrder = buyOrder;
    this._sellOrder = sellOrder;
    this._updatedAt = timestamp;
  }

  /**
   * Swap in a recreated BUY. The previous BUY must be canceled or failed.
   */
  replaceBuyOrder(newBuyOrder: Order, timestamp: number): Order | null {
    this.assertOpen('replace the BUY of');
    if (newBuyOrder.side !== 'BUY' || newBuyOrder.symbol !== this.symbol) {
      throw new ValidationError(`Order ${newBuyOrder.id} cannot be the BUY of deal ${this.id}`);
    }

    const previous = this._buyOrder;
    if (previous && (!previous.isTerminal || previous.isFilled)) {
      throw new DealStateError(
        `BUY order ${previous.id} of deal ${this.id} is ${previous.status} and cannot be replaced`
      );
    }

    newBuyOrder.linkToDeal(this.id, timestamp);
    this._buyOrder = newBuyOrder;
    this._recreationCount += 1;
    this._lastRecreatedAt = timestamp;
    this._updatedAt = timestamp;
    return previous;
  }

  /**
   * OPEN → CLOSED with the realized profit
   */
  close(profit: Decimal, timestamp: number): void {
    this.assertOpen('close');
    if (this.hasActiveOrders) {
      throw new DealStateError(`Deal ${this.id} still has orders resting on the exchange`);
    }
    this._status = 'CLOSED';
    this._profit = profit;
    this._updatedAt = timestamp;
    this._closedAt = timestamp;
  }

  /**
   * OPEN → CANCELED. No-op (returns false) when already finished.
   */
  cancel(timestamp: number): boolean {
    if (!this.isOpen) {
      return false;
    }
    this._status = 'CANCELED';
    this._updatedAt = timestamp;
    this._closedAt = timestamp;
    return true;
  }

  private assertOpen(action: string): void {
    if (!this.isOpen) {
      throw new DealStateError(`Cannot ${action} deal ${this.id} in status ${this._status}`);
    }
  }

  toDict(): DealRecord {
    return {
      id: this.id,
      symbol: this.symbol,
      status: this._status,
      buy_order_id: this._buyOrder?.id ?? null,
      sell_order_id: this._sellOrder?.id ?? null,
      profit: this._profit?.toString() ?? null,
      created_at: this.createdAt,
      updated_at: this._updatedAt,
      closed_at: this._closedAt,
      recreation_count: this._recreationCount,
      last_recreated_at: this._lastRecreatedAt,
    };
  }

  static fromDict(
    record: DealRecord,
    pair: CurrencyPair,
    resolveOrder: (orderId: string) => Order | undefined
  ): Deal {
    if (pair.symbol !== record.symbol) {
      throw new ValidationError(`Pair ${pair.symbol} does not match deal symbol ${record.symbol}`);
    }
    return new Deal({
      id: record.id,
      pair,
      status: record.status,
      buyOrder: lookup(record.buy_order_id, resolveOrder),
      sellOrder: lookup(record.sell_order_id, resolveOrder),
      profit: optionalDecimal(record.profit),
      createdAt: record.created_at,
      updatedAt: record.updated_at,
      closedAt: record.closed_at,
      recreationCount: record.recreation_count,
      lastRecreatedAt: record.last_recreated_at,
    });
  }
}

function lookup(
  orderId: string | null,
  resolveOrder: (orderId: string) => Order | undefined
): Order | null {
  if (orderId === null) {
    return null;
  }
  const order = resolveOrder(orderId);
  if (!order) {
    throw new ValidationError(`Unknown order ${orderId}`);
  }
  return order;
}
