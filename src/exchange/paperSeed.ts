/**
 * Paper exchange seed
 *
 * Loads markets, start prices and balances for the simulator from a JSON
 * file (see paper-markets.json).
 */

import { readFileSync } from 'node:fs';
import { Decimal } from 'decimal.js';
import { ValidationError } from '../errors.js';
import type { MarketInfo } from '../market/types.js';
import type { PaperExchangeGateway } from './PaperExchangeGateway.js';
import { stringField } from './normalize.js';

export interface PaperMarketSeed {
  market: MarketInfo;
  price: Decimal;
}

export interface PaperSeed {
  balances: Map<string, Decimal>;
  markets: PaperMarketSeed[];
}

export function loadPaperSeed(file: string): PaperSeed {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return parsePaperSeed(raw);
}

export function parsePaperSeed(raw: unknown): PaperSeed {
  if (typeof raw !== 'object' || raw === null) {
    throw new ValidationError('Paper seed must be an object');
  }

  const balances = new Map<string, Decimal>();
  const rawBalances: unknown = Reflect.get(raw, 'balances');
  if (typeof rawBalances === 'object' && rawBalances !== null) {
    for (const [currency, amount] of Object.entries(rawBalances)) {
      balances.set(currency.toUpperCase(), decimalValue(amount, `balances.${currency}`));
    }
  }

  const rawMarkets: unknown = Reflect.get(raw, 'markets');
  if (!Array.isArray(rawMarkets)) {
    throw new ValidationError('Paper seed needs a "markets" array');
  }
  const markets = rawMarkets.map((entry: unknown, index) => parseMarket(entry, index));
  return { balances, markets };
}

export function seedPaperExchange(gateway: PaperExchangeGateway, seed: PaperSeed): void {
  for (const { market, price } of seed.markets) {
    gateway.addMarket(market, price);
  }
  for (const [currency, amount] of seed.balances) {
    gateway.setBalance(currency, amount);
  }
}

function parseMarket(entry: unknown, index: number): PaperMarketSeed {
  if (typeof entry !== 'object' || entry === null) {
    throw new ValidationError(`markets[${index}] must be an object`);
  }
  const required = (field: string): Decimal => decimalValue(Reflect.get(entry, field), `markets[${index}].${field}`);
  const optional = (field: string): Decimal | null => {
    const value: unknown = Reflect.get(entry, field);
    return value === undefined || value === null ? null : required(field);
  };
  const text = (field: string): string => {
    const value = stringField(entry, field);
    if (value === null) {
      throw new ValidationError(`markets[${index}].${field} is required`);
    }
    return value.toUpperCase();
  };

  return {
    market: {
      symbol: text('symbol'),
      baseCurrency: text('baseCurrency'),
      quoteCurrency: text('quoteCurrency'),
      amountStep: required('amountStep'),
      priceStep: required('priceStep'),
      minQty: required('minQty'),
      maxQty: optional('maxQty'),
      minPrice: optional('minPrice'),
      maxPrice: optional('maxPrice'),
      minNotional: required('minNotional'),
      makerFeePercent: required('makerFeePercent'),
      takerFeePercent: required('takerFeePercent'),
    },
    price: required('price'),
  };
}

function decimalValue(value: unknown, field: string): Decimal {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ValidationError(`${field} must be a number or numeric string`);
  }
  try {
    return new Decimal(value);
  } catch {
    throw new ValidationError(`${field} is not a number: ${String(value)}`);
  }
}
