/**
 * Staleness Policy
 *
 * Set of predicates deciding whether an open BUY order should be
 * remediated. An order is stale when at least one predicate fires.
 */

import type { Order } from '../orders/Order.js';
import type { StalenessContext, StalenessPredicate, StalenessReason } from './types.js';

const MS_PER_MINUTE = 60_000;

export class StalenessPolicy {
  private readonly predicates: StalenessPredicate[];

  constructor(predicates: StalenessPredicate[]) {
    this.predicates = predicates;
  }

  static fromConfig(config: { maxAgeMinutes: number; maxPriceDeviationPercent: number }): StalenessPolicy {
    return new StalenessPolicy([
      StalenessPolicy.ageBased(config.maxAgeMinutes),
      StalenessPolicy.priceDeviation(config.maxPriceDeviationPercent),
    ]);
  }

  /**
   * Fires when the order has been open longer than maxAgeMinutes
   */
  static ageBased(maxAgeMinutes: number): StalenessPredicate {
    return {
      name: 'age',
      needsMarketPrice: false,
      evaluate(order: Order, context: StalenessContext): StalenessReason | null {
        const ageMinutes = (context.now - order.createdAt) / MS_PER_MINUTE;
        if (ageMinutes <= maxAgeMinutes) return null;
        return {
          kind: 'age',
          detail: `Order age ${ageMinutes.toFixed(1)}m exceeds ${maxAgeMinutes}m`,
        };
      },
    };
  }

  /**
   * Fires when the market has moved above the BUY price by more than
   * maxDeviationPercent, so the order is unlikely to fill
   */
  static priceDeviation(maxDeviationPercent: number): StalenessPredicate {
    return {
      name: 'price_deviation',
      needsMarketPrice: true,
      evaluate(order: Order, context: StalenessContext): StalenessReason | null {
        if (context.marketPrice === null || order.price.lte(0)) return null;
        const deviation = context.marketPrice.minus(order.price).div(order.price).mul(100);
        if (deviation.lte(maxDeviationPercent)) return null;
        return {
          kind: 'price_deviation',
          detail: `Market ${context.marketPrice.toString()} is ${deviation.toFixed(2)}% above order price ${order.price.toString()}`,
        };
      },
    };
  }

  get needsMarketPrice(): boolean {
    return this.predicates.some((predicate) => predicate.needsMarketPrice);
  }

  evaluate(order: Order, context: StalenessContext): StalenessReason[] {
    const reasons: StalenessReason[] = [];
    for (const predicate of this.predicates) {
      const reason = predicate.evaluate(order, context);
      if (reason) reasons.push(reason);
    }
    return reasons;
  }
}
