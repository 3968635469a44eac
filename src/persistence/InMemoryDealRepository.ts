/**
 * In-memory deal repository, keyed by deal id
 */

import type { Deal } from '../deals/Deal.js';
import type { DealRepository } from './types.js';

export class InMemoryDealRepository implements DealRepository {
  private readonly deals: Map<string, Deal> = new Map();

  save(deal: Deal): Deal {
    this.deals.set(deal.id, deal);
    return deal;
  }

  getById(id: string): Deal | undefined {
    return this.deals.get(id);
  }

  getAll(): Deal[] {
    return Array.from(this.deals.values());
  }

  getOpenDeals(symbol?: string): Deal[] {
    return this.getAll().filter(
      (deal) => deal.isOpen && (symbol === undefined || deal.symbol === symbol)
    );
  }
}
