/**
 * Exchange Module
 */

export { BinanceSpotGateway } from './BinanceSpotGateway.js';
export type { BinanceGatewayConfig } from './BinanceSpotGateway.js';
export { PaperExchangeGateway } from './PaperExchangeGateway.js';
export type { PaperExchangeOptions } from './PaperExchangeGateway.js';
export { loadPaperSeed, parsePaperSeed, seedPaperExchange } from './paperSeed.js';
export type { PaperSeed, PaperMarketSeed } from './paperSeed.js';
export { normalizeBinanceOrder, toExchangeError, mapOrderStatus } from './normalize.js';
export type {
  ExchangeGateway,
  ExchangeOrderStatus,
  OrderSnapshot,
  CreateOrderRequest,
  BalanceCheckRequest,
  BalanceCheckResult,
} from './types.js';
