/**
 * In-memory order repository, keyed by order id
 */

import type { Order } from '../orders/Order.js';
import type { OrderSide } from '../orders/types.js';
import type { OrderRepository } from './types.js';

export class InMemoryOrderRepository implements OrderRepository {
  private readonly orders: Map<string, Order> = new Map();

  save(order: Order): Order {
    this.orders.set(order.id, order);
    return order;
  }

  getById(id: string): Order | undefined {
    return this.orders.get(id);
  }

  getAll(): Order[] {
    return Array.from(this.orders.values());
  }

  getOpenOrders(side?: OrderSide): Order[] {
    return this.getAll().filter(
      (order) => !order.isTerminal && (side === undefined || order.side === side)
    );
  }

  getByDeal(dealId: string): Order[] {
    return this.getAll().filter((order) => order.dealId === dealId);
  }
}
