/**
 * Tests for BinanceSpotGateway
 *
 * The binance client is replaced by an in-process stub.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Decimal } from 'decimal.js';
import { BinanceSpotGateway } from '../../src/exchange/BinanceSpotGateway.js';
import { ExchangeError } from '../../src/errors.js';
import { START_TIME } from '../support.js';

const client = vi.hoisted(() => ({
  submitNewOrder: vi.fn(),
  cancelOrder: vi.fn(),
  getOrder: vi.fn(),
  getSymbolPriceTicker: vi.fn(),
  getAccountInformation: vi.fn(),
  getExchangeInfo: vi.fn(),
}));

vi.mock('binance', () => ({
  MainClient: function MainClient() {
    return client;
  },
}));

const ETH_INFO = {
  symbols: [
    {
      symbol: 'ETHUSDT',
      baseAsset: 'ETH',
      quoteAsset: 'USDT',
      filters: [
        { filterType: 'PRICE_FILTER', minPrice: '0.01000000', maxPrice: '1000000.00000000', tickSize: '0.01000000' },
        { filterType: 'LOT_SIZE', minQty: '0.00010000', maxQty: '9000.00000000', stepSize: '0.00010000' },
        { filterType: 'NOTIONAL', minNotional: '5.00000000' },
      ],
    },
  ],
};

describe('BinanceSpotGateway', () => {
  let gateway: BinanceSpotGateway;

  beforeEach(() => {
    vi.clearAllMocks();
    client.getAccountInformation.mockResolvedValue({
      makerCommission: 10,
      takerCommission: 20,
      balances: [{ asset: 'USDT', free: '50.00000000', locked: '0.00000000' }],
    });
    client.getExchangeInfo.mockResolvedValue(ETH_INFO);
    gateway = new BinanceSpotGateway(
      { apiKey: 'test-key', apiSecret: 'test-secret', testnet: true, defaultFeePercent: 0.1 },
      () => START_TIME
    );
  });

  describe('fetchMarket', () => {
    it('should read steps and limits from the symbol filters', async () => {
      const market = await gateway.fetchMarket('ETHUSDT');

      expect(market.priceStep.toString()).toBe('0.01');
      expect(market.amountStep.toString()).toBe('0.0001');
      expect(market.minQty.toString()).toBe('0.0001');
      expect(market.maxQty?.toString()).toBe('9000');
      expect(market.minNotional.toString()).toBe('5');
      expect(market.quoteCurrency).toBe('USDT');
    });

    it('should take fees from the account commission in basis points', async () => {
      const market = await gateway.fetchMarket('ETHUSDT');

      expect(market.makerFeePercent.toString()).toBe('0.1');
      expect(market.takerFeePercent.toString()).toBe('0.2');
      expect(client.getAccountInformation).toHaveBeenCalledTimes(1);
    });

    it('should reject an unknown symbol', async () => {
      await expect(gateway.fetchMarket('XRPUSDT')).rejects.toMatchObject({
        kind: 'rejected',
        message: 'Symbol not found: XRPUSDT',
      });
    });
  });

  describe('createOrder', () => {
    it('should submit a GTC limit order and normalize the response', async () => {
      client.submitNewOrder.mockResolvedValue({
        symbol: 'ETHUSDT',
        orderId: 12345,
        transactTime: START_TIME + 7,
        price: '3000.00000000',
        origQty: '0.03320000',
        executedQty: '0.00000000',
        cummulativeQuoteQty: '0.00000000',
        status: 'NEW',
        type: 'LIMIT',
        side: 'BUY',
      });

      const snapshot = await gateway.createOrder({
        symbol: 'ETHUSDT',
        side: 'BUY',
        type: 'LIMIT',
        amount: new Decimal('0.0332'),
        price: new Decimal('3000'),
        clientOrderId: 'order-1',
      });

      expect(client.submitNewOrder).toHaveBeenCalledWith({
        symbol: 'ETHUSDT',
        side: 'BUY',
        type: 'LIMIT',
        timeInForce: 'GTC',
        quantity: 0.0332,
        price: 3000,
        newClientOrderId: 'order-1',
        newOrderRespType: 'RESULT',
      });
      expect(snapshot.exchangeId).toBe('12345');
      expect(snapshot.status).toBe('open');
      expect(snapshot.amount.toString()).toBe('0.0332');
      expect(snapshot.timestamp).toBe(START_TIME + 7);
    });

    it('should map an exchange rejection', async () => {
      client.submitNewOrder.mockRejectedValue({
        code: -2010,
        message: 'Account has insufficient balance for requested action.',
      });

      const placing = gateway.createOrder({
        symbol: 'ETHUSDT',
        side: 'BUY',
        type: 'LIMIT',
        amount: new Decimal('1'),
        price: new Decimal('3000'),
      });

      await expect(placing).rejects.toBeInstanceOf(ExchangeError);
      await expect(placing).rejects.toMatchObject({ kind: 'rejected', exchangeCode: -2010 });
    });
  });

  describe('orders', () => {
    it('should refuse a non-numeric order id', async () => {
      await expect(gateway.fetchOrder('abc', 'ETHUSDT')).rejects.toThrow('Invalid Binance order id: abc');
      expect(client.getOrder).not.toHaveBeenCalled();
    });

    it('should cancel by numeric order id', async () => {
      client.cancelOrder.mockResolvedValue({
        symbol: 'ETHUSDT',
        orderId: 12345,
        price: '3000.00000000',
        origQty: '0.03320000',
        executedQty: '0.00000000',
        cummulativeQuoteQty: '0.00000000',
        status: 'CANCELED',
        type: 'LIMIT',
        side: 'BUY',
      });

      const snapshot = await gateway.cancelOrder('12345', 'ETHUSDT');

      expect(client.cancelOrder).toHaveBeenCalledWith({ symbol: 'ETHUSDT', orderId: 12345 });
      expect(snapshot.status).toBe('canceled');
      expect(snapshot.timestamp).toBe(START_TIME);
    });
  });

  describe('fetchTicker', () => {
    it('should parse the last price', async () => {
      client.getSymbolPriceTicker.mockResolvedValue({ symbol: 'ETHUSDT', price: '3012.34000000' });

      expect((await gateway.fetchTicker('ETHUSDT')).toString()).toBe('3012.34');
    });

    it('should treat a network failure as retryable', async () => {
      client.getSymbolPriceTicker.mockRejectedValue(
        Object.assign(new Error('connect ETIMEDOUT'), { code: 'ETIMEDOUT' })
      );

      await expect(gateway.fetchTicker('ETHUSDT')).rejects.toMatchObject({ kind: 'network', retryable: true });
    });
  });

  describe('checkSufficientBalance', () => {
    it('should compare the free quote balance with the order value', async () => {
      const check = await gateway.checkSufficientBalance({
        symbol: 'ETHUSDT',
        side: 'BUY',
        amount: new Decimal('0.0332'),
        price: new Decimal('3000'),
      });

      expect(check.ok).toBe(false);
      expect(check.currency).toBe('USDT');
      expect(check.available.toString()).toBe('50');
      expect(check.required.toString()).toBe('99.6');
    });
  });

  describe('verifyConnection', () => {
    it('should report a failed account query as not connected', async () => {
      client.getAccountInformation.mockRejectedValue({ code: -2015, message: 'Invalid API-key' });

      expect(await gateway.verifyConnection()).toBe(false);
    });
  });
});
