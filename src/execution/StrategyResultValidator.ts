/**
 * Strategy Result Validator
 *
 * Pre-execution validation of a strategy result, either the object form
 * or the positional 5-tuple. Nothing is written before this passes.
 */

import { Decimal } from 'decimal.js';
import { isMultipleOf } from '../utils/decimal.js';
import type { CurrencyPair } from '../market/types.js';
import type { ValidatedStrategy, ValidationResult } from './types.js';

const FIELDS = ['buyPrice', 'coinsToBuy', 'sellPrice', 'coinsToSell'] as const;

type StrategyField = (typeof FIELDS)[number];

export class StrategyResultValidator {
  /**
   * Validate shape, then the pair's precision and limits
   */
  validate(pair: CurrencyPair, input: unknown): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const raw = this.extractFields(input);
    if (!raw) {
      return {
        valid: false,
        errors: ['Strategy result must be an object or a 5-tuple'],
        warnings,
        strategy: null,
      };
    }

    const values: Partial<Record<StrategyField, Decimal>> = {};
    for (const field of FIELDS) {
      const parsed = parsePositive(raw[field]);
      if (parsed === null) {
        errors.push(`${field} must be a positive number`);
      } else {
        values[field] = parsed;
      }
    }

    const { buyPrice, coinsToBuy, sellPrice, coinsToSell } = values;
    if (!buyPrice || !coinsToBuy || !sellPrice || !coinsToSell) {
      return { valid: false, errors, warnings, strategy: null };
    }
    const strategy: ValidatedStrategy = { buyPrice, coinsToBuy, sellPrice, coinsToSell };

    // 1. Precision
    if (!isMultipleOf(buyPrice, pair.priceStep)) {
      errors.push(`Buy price ${buyPrice.toString()} is not a multiple of ${pair.priceStep.toString()}`);
    }
    if (!isMultipleOf(sellPrice, pair.priceStep)) {
      errors.push(`Sell price ${sellPrice.toString()} is not a multiple of ${pair.priceStep.toString()}`);
    }
    for (const [name, amount] of [
      ['coinsToBuy', coinsToBuy],
      ['coinsToSell', coinsToSell],
    ] as const) {
      if (!isMultipleOf(amount, pair.amountStep)) {
        errors.push(`${name} ${amount.toString()} is not a multiple of ${pair.amountStep.toString()}`);
      }
    }

    // 2. Quantity limits
    if (coinsToSell.gt(coinsToBuy)) {
      errors.push('coinsToSell exceeds coinsToBuy');
    }
    if (coinsToBuy.lt(pair.minQty)) {
      errors.push(`Quantity ${coinsToBuy.toString()} below minimum ${pair.minQty.toString()}`);
    }
    if (pair.maxQty !== null && coinsToBuy.gt(pair.maxQty)) {
      errors.push(`Quantity ${coinsToBuy.toString()} above maximum ${pair.maxQty.toString()}`);
    }

    // 3. Notional
    const notional = coinsToBuy.mul(buyPrice);
    if (notional.lt(pair.minNotional)) {
      errors.push(
        `Notional ${notional.toString()} below minimum ${pair.minNotional.toString()}`
      );
    }

    if (sellPrice.lte(buyPrice)) {
      warnings.push(`Sell price ${sellPrice.toString()} does not exceed buy price ${buyPrice.toString()}`);
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
      strategy: errors.length === 0 ? strategy : null,
    };
  }

  private extractFields(input: unknown): Record<StrategyField, unknown> | null {
    if (Array.isArray(input)) {
      if (input.length !== 5) return null;
      const [buyPrice, coinsToBuy, sellPrice, coinsToSell] = input;
      return { buyPrice, coinsToBuy, sellPrice, coinsToSell };
    }
    if (typeof input === 'object' && input !== null) {
      return {
        buyPrice: Reflect.get(input, 'buyPrice'),
        coinsToBuy: Reflect.get(input, 'coinsToBuy'),
        sellPrice: Reflect.get(input, 'sellPrice'),
        coinsToSell: Reflect.get(input, 'coinsToSell'),
      };
    }
    return null;
  }
}

function parsePositive(value: unknown): Decimal | null {
  if (!(value instanceof Decimal) && typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() && parsed.gt(0) ? parsed : null;
  } catch {
    return null;
  }
}
