/**
 * Order Factory
 */

import { randomUUID } from 'node:crypto';
import { systemClock, type Clock } from '../utils/clock.js';
import { toDecimal, type DecimalInput } from '../utils/decimal.js';
import { Order } from './Order.js';
import type { OrderSide, OrderType } from './types.js';

export interface NewOrderParams {
  symbol: string;
  side: OrderSide;
  amount: DecimalInput;
  price: DecimalInput;
  type?: OrderType;
  dealId?: string | null;
}

export class OrderFactory {
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(clock: Clock = systemClock, generateId: () => string = randomUUID) {
    this.clock = clock;
    this.generateId = generateId;
  }

  create(params: NewOrderParams): Order {
    return new Order({
      id: this.generateId(),
      symbol: params.symbol.toUpperCase(),
      side: params.side,
      type: params.type ?? 'LIMIT',
      price: toDecimal(params.price),
      amount: toDecimal(params.amount),
      dealId: params.dealId ?? null,
      createdAt: this.clock(),
    });
  }

  createBuy(params: Omit<NewOrderParams, 'side'>): Order {
    return this.create({ ...params, side: 'BUY' });
  }

  createSell(params: Omit<NewOrderParams, 'side'>): Order {
    return this.create({ ...params, side: 'SELL' });
  }
}
