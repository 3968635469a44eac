/**
 * Binance Spot Gateway
 *
 * ExchangeGateway over the Binance Spot REST API. Every response is
 * normalized into OrderSnapshot and every library error into ExchangeError.
 * Rate limiting is left to the exchange (-1003 surfaces as rate_limit).
 */

import { MainClient } from 'binance';
import { Decimal } from 'decimal.js';
import { ExchangeError } from '../errors.js';
import { logger, maskSecret } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { MarketInfo } from '../market/types.js';
import {
  normalizeBinanceOrder,
  numericField,
  stringField,
  toExchangeError,
} from './normalize.js';
import type {
  BalanceCheckRequest,
  BalanceCheckResult,
  CreateOrderRequest,
  ExchangeGateway,
  OrderSnapshot,
} from './types.js';

const TESTNET_BASE_URL = 'https://testnet.binance.vision';

export interface BinanceGatewayConfig {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
  /** Used until the account's commission rates are known */
  defaultFeePercent: number;
}

export class BinanceSpotGateway implements ExchangeGateway {
  readonly name = 'binance';

  private readonly client: MainClient;
  private readonly clock: Clock;
  private makerFeePercent: Decimal;
  private takerFeePercent: Decimal;
  private feesLoaded = false;

  /** Whether using testnet */
  public readonly isTestnet: boolean;

  constructor(config: BinanceGatewayConfig, clock: Clock = systemClock) {
    this.isTestnet = config.testnet;
    this.clock = clock;
    this.makerFeePercent = new Decimal(config.defaultFeePercent);
    this.takerFeePercent = new Decimal(config.defaultFeePercent);
    this.client = new MainClient({
      api_key: config.apiKey,
      api_secret: config.apiSecret,
      ...(config.testnet ? { baseUrl: TESTNET_BASE_URL } : {}),
    });

    logger.info('Binance Spot Gateway initialized', {
      testnet: config.testnet,
      apiKey: maskSecret(config.apiKey),
    });
  }

  /**
   * Verify API connection and permissions
   */
  async verifyConnection(): Promise<boolean> {
    try {
      await this.loadCommissionRates();
      logger.info('Binance API connection verified');
      return true;
    } catch (error) {
      logger.error('Binance API connection failed', {
        error: toExchangeError(error).message,
      });
      return false;
    }
  }

  /**
   * Submit a LIMIT (GTC) or MARKET order
   */
  async createOrder(request: CreateOrderRequest): Promise<OrderSnapshot> {
    logger.info('Submitting order', {
      symbol: request.symbol,
      side: request.side,
      type: request.type,
      amount: request.amount.toString(),
      price: request.price.toString(),
    });

    try {
      const result =
        request.type === 'MARKET'
          ? await this.client.submitNewOrder({
              symbol: request.symbol,
              side: request.side,
              type: 'MARKET',
              quantity: request.amount.toNumber(),
              newClientOrderId: request.clientOrderId,
              newOrderRespType: 'RESULT',
            })
          : await this.client.submitNewOrder({
              symbol: request.symbol,
              side: request.side,
              type: 'LIMIT',
              timeInForce: 'GTC',
              quantity: request.amount.toNumber(),
              price: request.price.toNumber(),
              newClientOrderId: request.clientOrderId,
              newOrderRespType: 'RESULT',
            });

      const snapshot = this.normalize(result);
      logger.info('Order accepted by exchange', {
        exchangeId: snapshot.exchangeId,
        status: snapshot.status,
      });
      return snapshot;
    } catch (error) {
      throw this.fail('Order submission failed', error, { symbol: request.symbol });
    }
  }

  async cancelOrder(exchangeId: string, symbol: string): Promise<OrderSnapshot> {
    try {
      const result = await this.client.cancelOrder({
        symbol,
        orderId: this.toOrderId(exchangeId),
      });
      return this.normalize(result);
    } catch (error) {
      throw this.fail('Order cancel failed', error, { symbol, exchangeId });
    }
  }

  async fetchOrder(exchangeId: string, symbol: string): Promise<OrderSnapshot> {
    try {
      const result = await this.client.getOrder({
        symbol,
        orderId: this.toOrderId(exchangeId),
      });
      return this.normalize(result);
    } catch (error) {
      throw this.fail('Order query failed', error, { symbol, exchangeId });
    }
  }

  /**
   * Get last traded price for symbol
   */
  async fetchTicker(symbol: string): Promise<Decimal> {
    try {
      const prices = await this.client.getSymbolPriceTicker({ symbol });

      // API returns array for multiple symbols, single object for one symbol
      const priceData = Array.isArray(prices)
        ? prices.find((p) => p.symbol === symbol)
        : prices;
      const price = priceData ? numericField(priceData, 'price') : null;
      if (price === null) {
        throw new ExchangeError('not_found', `Price not found for symbol: ${symbol}`);
      }
      return price;
    } catch (error) {
      throw this.fail('Failed to get ticker', error, { symbol });
    }
  }

  async checkSufficientBalance(request: BalanceCheckRequest): Promise<BalanceCheckResult> {
    const market = await this.fetchMarket(request.symbol);
    const currency = request.side === 'BUY' ? market.quoteCurrency : market.baseCurrency;
    const required =
      request.side === 'BUY' ? request.amount.mul(request.price) : request.amount;

    try {
      const account = await this.client.getAccountInformation();
      const balance = account.balances.find((b) => b.asset === currency);
      const available = (balance ? numericField(balance, 'free') : null) ?? new Decimal(0);
      return { ok: available.gte(required), currency, available, required };
    } catch (error) {
      throw this.fail('Failed to get balance', error, { currency });
    }
  }

  /**
   * Get symbol trading rules (tick size, lot size, notional)
   */
  async fetchMarket(symbol: string): Promise<MarketInfo> {
    try {
      if (!this.feesLoaded) {
        await this.loadCommissionRates();
      }

      const exchangeInfo = await this.client.getExchangeInfo({ symbol });
      const symbolData = exchangeInfo.symbols.find((s) => s.symbol === symbol);
      if (!symbolData) {
        throw new ExchangeError('rejected', `Symbol not found: ${symbol}`, -1121);
      }

      const filters: object[] = symbolData.filters;
      const priceFilter = findFilter(filters, 'PRICE_FILTER');
      const lotSizeFilter = findFilter(filters, 'LOT_SIZE');
      const notionalFilter =
        findFilter(filters, 'NOTIONAL') ?? findFilter(filters, 'MIN_NOTIONAL');

      const priceStep = priceFilter ? numericField(priceFilter, 'tickSize') : null;
      const amountStep = lotSizeFilter ? numericField(lotSizeFilter, 'stepSize') : null;
      if (priceStep === null || priceStep.lte(0) || amountStep === null || amountStep.lte(0)) {
        throw new ExchangeError('unknown', `Incomplete trading rules for ${symbol}`);
      }

      return {
        symbol: symbolData.symbol,
        baseCurrency: symbolData.baseAsset,
        quoteCurrency: symbolData.quoteAsset,
        amountStep,
        priceStep,
        minQty: (lotSizeFilter ? numericField(lotSizeFilter, 'minQty') : null) ?? new Decimal(0),
        maxQty: positiveOrNull(lotSizeFilter ? numericField(lotSizeFilter, 'maxQty') : null),
        minPrice: positiveOrNull(priceFilter ? numericField(priceFilter, 'minPrice') : null),
        maxPrice: positiveOrNull(priceFilter ? numericField(priceFilter, 'maxPrice') : null),
        minNotional:
          (notionalFilter
            ? numericField(notionalFilter, 'minNotional') ?? numericField(notionalFilter, 'notional')
            : null) ?? new Decimal(0),
        makerFeePercent: this.makerFeePercent,
        takerFeePercent: this.takerFeePercent,
      };
    } catch (error) {
      throw this.fail('Failed to get symbol info', error, { symbol });
    }
  }

  /**
   * Account commission is reported in basis points (10 = 0.1%)
   */
  private async loadCommissionRates(): Promise<void> {
    const account = await this.client.getAccountInformation();
    const maker = numericField(account, 'makerCommission');
    const taker = numericField(account, 'takerCommission');
    if (maker !== null && taker !== null && maker.gt(0) && taker.gt(0)) {
      this.makerFeePercent = maker.div(100);
      this.takerFeePercent = taker.div(100);
    }
    this.feesLoaded = true;
  }

  private normalize(raw: object): OrderSnapshot {
    return normalizeBinanceOrder(raw, this.takerFeePercent, this.clock());
  }

  private toOrderId(exchangeId: string): number {
    const orderId = Number(exchangeId);
    if (!Number.isSafeInteger(orderId)) {
      throw new ExchangeError('rejected', `Invalid Binance order id: ${exchangeId}`);
    }
    return orderId;
  }

  private fail(message: string, error: unknown, meta: Record<string, string>): ExchangeError {
    const exchangeError = toExchangeError(error);
    logger.error(message, {
      ...meta,
      kind: exchangeError.kind,
      code: exchangeError.exchangeCode,
      error: exchangeError.message,
    });
    return exchangeError;
  }
}

function findFilter(filters: object[], filterType: string): object | undefined {
  return filters.find((filter) => stringField(filter, 'filterType') === filterType);
}

function positiveOrNull(value: Decimal | null): Decimal | null {
  return value !== null && value.gt(0) ? value : null;
}
