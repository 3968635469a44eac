/**
 * Strategy Calculator
 *
 * Fixed-point sizing of one deal: how many coins to buy at which price,
 * and where to sell them for the desired profit. Rounding always protects
 * the budget: anything that consumes budget rounds down, the total cost
 * rounds up.
 */

import { Decimal } from 'decimal.js';
import {
  ceilToStep,
  floorToStep,
  roundToStep,
  toDecimal,
  type DecimalInput,
} from '../utils/decimal.js';
import type { CurrencyPair } from '../market/types.js';
import type { CalculationOutcome, CalculatorInput, StrategyTuple } from './types.js';

/** Net profit must reach this share of the budget */
export const MIN_PROFIT_RATIO = new Decimal('0.005');

const HUNDRED = new Decimal(100);

export class StrategyCalculator {
  calculate(input: CalculatorInput): CalculationOutcome {
    let buyPrice: Decimal;
    let budget: Decimal;
    let minStep: Decimal;
    let priceStep: Decimal;
    let buyFee: Decimal;
    let sellFee: Decimal;
    let profit: Decimal;
    let minNotional: Decimal | null;
    let minQty: Decimal | null;
    let maxQty: Decimal | null;
    try {
      buyPrice = toDecimal(input.buyPrice);
      budget = toDecimal(input.budget);
      minStep = toDecimal(input.minStep);
      priceStep = toDecimal(input.priceStep);
      buyFee = toDecimal(input.buyFeePercent);
      sellFee = toDecimal(input.sellFeePercent);
      profit = toDecimal(input.profitPercent);
      minNotional = optional(input.minNotional);
      minQty = optional(input.minQty);
      maxQty = optional(input.maxQty);
    } catch {
      return fail('Calculator input is not numeric');
    }

    if (!buyPrice.isFinite() || buyPrice.lte(0)) return fail('Buy price must be positive');
    if (!budget.isFinite() || budget.lte(0)) return fail('Budget must be positive');
    if (!minStep.isFinite() || minStep.lte(0)) return fail('Quantity step must be positive');
    if (!priceStep.isFinite() || priceStep.lte(0)) return fail('Price step must be positive');
    if (!isPercent(buyFee) || !isPercent(sellFee)) {
      return fail('Fees must be within [0, 100) percent');
    }
    if (!profit.isFinite() || profit.lt(0)) return fail('Profit percent must not be negative');

    if (minNotional !== null && budget.lt(minNotional)) {
      return fail(
        `Insufficient budget: ${budget.toString()} is below the minimum notional ${minNotional.toString()}`
      );
    }

    // 1. Buy price including the buy fee
    const buyPriceWithFee = floorToStep(buyPrice.mul(HUNDRED.plus(buyFee)).div(HUNDRED), priceStep);
    if (buyPriceWithFee.lte(0)) {
      return fail('Buy price is below one price step');
    }

    // 2. Coins that survive the sell fee
    const sellFeeRatio = HUNDRED.minus(sellFee).div(HUNDRED);
    const sellable = floorToStep(budget.div(buyPriceWithFee).mul(sellFeeRatio), minStep);

    // 3. Coins to buy so that `sellable` remain after the sell fee
    const coinsToBuy = floorToStep(sellable.div(sellFeeRatio), minStep);
    if (coinsToBuy.lte(0) || sellable.lte(0)) {
      return fail(`Budget ${budget.toString()} does not cover one quantity step`);
    }
    if (minQty !== null && coinsToBuy.lt(minQty)) {
      return fail(`Quantity ${coinsToBuy.toString()} below minimum ${minQty.toString()}`);
    }
    if (maxQty !== null && coinsToBuy.gt(maxQty)) {
      return fail(`Quantity ${coinsToBuy.toString()} above maximum ${maxQty.toString()}`);
    }

    // 4. Total cost
    const totalCost = ceilToStep(coinsToBuy.mul(buyPriceWithFee), priceStep);
    if (totalCost.gt(budget)) {
      return fail(`Total cost ${totalCost.toString()} exceeds budget ${budget.toString()}`);
    }
    if (minNotional !== null && totalCost.lt(minNotional)) {
      return fail(
        `Total cost ${totalCost.toString()} below the minimum notional ${minNotional.toString()}`
      );
    }

    // 5. Sell price with the desired profit
    const sellPrice = roundToStep(buyPrice.mul(HUNDRED.plus(profit)).div(HUNDRED), priceStep);

    // 6. Profitability
    const netProfit = sellable.mul(sellPrice).minus(totalCost);
    const minProfit = budget.mul(MIN_PROFIT_RATIO);
    if (netProfit.lt(minProfit)) {
      return fail(
        `Net profit ${netProfit.toString()} below minimum ${minProfit.toString()}`
      );
    }

    return {
      ok: true,
      result: {
        buyPrice: floorToStep(buyPrice, priceStep),
        coinsToBuy,
        sellPrice,
        coinsToSell: sellable,
        info: { buyPriceWithFee, totalCost, netProfit, minProfit },
      },
    };
  }

  /**
   * Size a deal with the pair's steps, limits, fees and markup
   */
  calculateForPair(
    pair: CurrencyPair,
    buyPrice: DecimalInput,
    budget: DecimalInput = pair.dealQuota
  ): CalculationOutcome {
    return this.calculate({
      buyPrice,
      budget,
      minStep: pair.amountStep,
      priceStep: pair.priceStep,
      buyFeePercent: pair.takerFeePercent,
      sellFeePercent: pair.takerFeePercent,
      profitPercent: pair.profitMarkupPercent,
      minNotional: pair.minNotional,
      minQty: pair.minQty,
      maxQty: pair.maxQty,
    });
  }

  static toTuple(outcome: Extract<CalculationOutcome, { ok: true }>): StrategyTuple {
    const { buyPrice, coinsToBuy, sellPrice, coinsToSell, info } = outcome.result;
    return [buyPrice, coinsToBuy, sellPrice, coinsToSell, info];
  }
}

function fail(reason: string): CalculationOutcome {
  return { ok: false, reason };
}

function isPercent(value: Decimal): boolean {
  return value.isFinite() && value.gte(0) && value.lt(HUNDRED);
}

function optional(value: DecimalInput | null | undefined): Decimal | null {
  if (value === null || value === undefined) return null;
  const parsed = toDecimal(value);
  return parsed.gt(0) ? parsed : null;
}
