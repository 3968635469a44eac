/**
 * Decimal helpers
 *
 * Step rounding for exchange tick/lot sizes. Results are always exact
 * multiples of the step.
 */

import { Decimal } from 'decimal.js';

export type DecimalInput = Decimal.Value;

export function toDecimal(value: DecimalInput): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

function quantize(value: DecimalInput, step: DecimalInput, rounding: Decimal.Rounding): Decimal {
  const stepValue = toDecimal(step);
  if (stepValue.lte(0)) {
    throw new RangeError(`Step must be positive, got ${stepValue.toString()}`);
  }
  return toDecimal(value).div(stepValue).toDecimalPlaces(0, rounding).mul(stepValue);
}

export function floorToStep(value: DecimalInput, step: DecimalInput): Decimal {
  return quantize(value, step, Decimal.ROUND_FLOOR);
}

export function ceilToStep(value: DecimalInput, step: DecimalInput): Decimal {
  return quantize(value, step, Decimal.ROUND_CEIL);
}

export function roundToStep(value: DecimalInput, step: DecimalInput): Decimal {
  return quantize(value, step, Decimal.ROUND_HALF_UP);
}

export function isMultipleOf(value: DecimalInput, step: DecimalInput): boolean {
  return toDecimal(value).mod(toDecimal(step)).isZero();
}

/** Parse an optional decimal string, null stays null */
export function optionalDecimal(value: string | null | undefined): Decimal | null {
  return value === null || value === undefined ? null : new Decimal(value);
}
