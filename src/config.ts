import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item.length > 0);
}

function getExchangeMode(): 'paper' | 'binance' {
  const mode = getEnvVar('EXCHANGE_MODE', 'paper').toLowerCase();
  if (mode === 'paper' || mode === 'binance') {
    return mode;
  }
  throw new Error(`EXCHANGE_MODE must be "paper" or "binance", got "${mode}"`);
}

export const config = {
  // Exchange Configuration
  exchange: {
    /** paper = in-process simulator, binance = Binance Spot REST API */
    mode: getExchangeMode(),
    apiKey: getEnvVar('BINANCE_API_KEY', ''),
    apiSecret: getEnvVar('BINANCE_API_SECRET', ''),
    testnet: getEnvBoolean('BINANCE_TESTNET', true),
  },

  // Paper Exchange Configuration
  paper: {
    /** Markets, start prices and balances of the simulator */
    marketsFile: getEnvVar('PAPER_MARKETS_FILE', 'paper-markets.json'),
  },

  // Trading Configuration
  trading: {
    symbols: getEnvList('TRADING_SYMBOLS', ['ETHUSDT']),

    /** Budget per deal in quote currency */
    dealQuota: getEnvNumber('DEAL_QUOTA', 100),

    /** Desired profit per deal in percent (1 = 1%) */
    profitMarkupPercent: getEnvNumber('PROFIT_MARKUP_PERCENT', 1),

    /** Simultaneously open deals per pair */
    maxOpenDeals: getEnvNumber('MAX_OPEN_DEALS', 1),

    /** Fee used when the exchange does not report one, in percent */
    defaultFeePercent: getEnvNumber('DEFAULT_FEE_PERCENT', 0.1),

    /** How long cached pair metadata stays fresh */
    marketCacheTtlMs: getEnvNumber('MARKET_CACHE_TTL_MS', 3_600_000),
  },

  // Order Placement Configuration
  orders: {
    retryAttempts: getEnvNumber('ORDER_RETRY_ATTEMPTS', 3),
    retryBaseDelayMs: getEnvNumber('ORDER_RETRY_BASE_DELAY_MS', 1000),
    retryBackoffFactor: getEnvNumber('ORDER_RETRY_BACKOFF_FACTOR', 2),
  },

  // Stale BUY Order Monitor Configuration
  buyMonitor: {
    enabled: getEnvBoolean('BUY_MONITOR_ENABLED', true),
    maxAgeMinutes: getEnvNumber('BUY_MONITOR_MAX_AGE_MINUTES', 15),
    maxPriceDeviationPercent: getEnvNumber('BUY_MONITOR_MAX_DEVIATION_PERCENT', 3),
    checkIntervalMs: getEnvNumber('BUY_MONITOR_INTERVAL_MS', 60_000),

    /** Orders younger than this are never touched */
    gracePeriodMs: getEnvNumber('BUY_MONITOR_GRACE_PERIOD_MS', 60_000),
    summaryIntervalMs: getEnvNumber('BUY_MONITOR_SUMMARY_INTERVAL_MS', 300_000),
  },

  // Stale Order Recreation Configuration
  recreation: {
    maxRecreationsPerDeal: getEnvNumber('MAX_RECREATIONS_PER_DEAL', 3),
    minMinutesBetweenRecreations: getEnvNumber('MIN_MINUTES_BETWEEN_RECREATIONS', 2),

    /** Replacement BUY price = market price * this factor */
    repriceFactor: getEnvNumber('RECREATION_PRICE_FACTOR', 0.999),
  },

  // Order Sync Monitor Configuration
  orderSync: {
    enabled: getEnvBoolean('ORDER_SYNC_ENABLED', true),
    intervalMs: getEnvNumber('ORDER_SYNC_INTERVAL_MS', 30_000),
  },

  // Deal Completion Monitor Configuration
  dealCompletion: {
    enabled: getEnvBoolean('DEAL_COMPLETION_ENABLED', true),
    intervalMs: getEnvNumber('DEAL_COMPLETION_INTERVAL_MS', 30_000),
  },

  // Telegram Configuration
  telegram: {
    enabled: getEnvBoolean('TELEGRAM_ENABLED', false),
    botToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
    chatId: getEnvVar('TELEGRAM_CHAT_ID', ''),
  },

  // Dashboard Configuration
  dashboard: {
    /** Enable status server */
    enabled: getEnvBoolean('DASHBOARD_ENABLED', true),

    /** Dashboard server port */
    port: getEnvNumber('DASHBOARD_PORT', 3000),

    /** Dashboard server host */
    host: getEnvVar('DASHBOARD_HOST', '0.0.0.0'),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    toFile: getEnvBoolean('LOG_TO_FILE', true),
    dir: getEnvVar('LOG_DIR', 'logs'),
  },
} as const;

export type Config = typeof config;
