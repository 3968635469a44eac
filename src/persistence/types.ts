/**
 * Repository Interfaces
 *
 * Synchronous, last-write-wins per row. No cross-row transactions.
 */

import type { Order } from '../orders/Order.js';
import type { OrderSide } from '../orders/types.js';
import type { Deal } from '../deals/Deal.js';

export interface OrderRepository {
  save(order: Order): Order;
  getById(id: string): Order | undefined;
  getAll(): Order[];
  /** PENDING, OPEN and PARTIALLY_FILLED orders */
  getOpenOrders(side?: OrderSide): Order[];
  getByDeal(dealId: string): Order[];
}

export interface DealRepository {
  save(deal: Deal): Deal;
  getById(id: string): Deal | undefined;
  getAll(): Deal[];
  getOpenDeals(symbol?: string): Deal[];
}
