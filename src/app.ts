/**
 * Application
 *
 * Composition root. Wires the exchange gateway, repositories, services
 * and monitors together:
 * Signal → Strategy Engine → Order Execution → Deals/Orders ← Monitors
 */

import { Decimal } from 'decimal.js';
import { logger } from './logger.js';
import { config, type Config } from './config.js';
import { errorMessage } from './errors.js';
import {
  BinanceSpotGateway,
  PaperExchangeGateway,
  loadPaperSeed,
  seedPaperExchange,
  type ExchangeGateway,
} from './exchange/index.js';
import { CurrencyPairRegistry } from './market/index.js';
import { InMemoryDealRepository, InMemoryOrderRepository } from './persistence/index.js';
import { OrderService } from './orders/index.js';
import { DealService } from './deals/index.js';
import { OrderExecutionService } from './execution/index.js';
import { StrategyEngine } from './strategy/index.js';
import {
  BuyOrderMonitor,
  DealCompletionMonitor,
  OrderSyncMonitor,
  OrderTimeoutService,
  StalenessPolicy,
  type MonitorStatus,
} from './monitoring/index.js';
import { NotificationService } from './notification/index.js';
import { DashboardServer } from './dashboard/index.js';

export class App {
  private readonly appConfig: Config;
  private readonly gateway: ExchangeGateway;
  private readonly registry: CurrencyPairRegistry;
  private readonly orderService: OrderService;
  private readonly dealService: DealService;
  private readonly executionService: OrderExecutionService;
  private readonly strategyEngine: StrategyEngine;
  private readonly buyOrderMonitor: BuyOrderMonitor;
  private readonly orderSyncMonitor: OrderSyncMonitor;
  private readonly dealCompletionMonitor: DealCompletionMonitor;
  private readonly notificationService: NotificationService;
  private readonly dashboard: DashboardServer;
  private isRunning = false;

  constructor(appConfig: Config = config) {
    this.appConfig = appConfig;
    this.gateway = createGateway(appConfig);

    // Repositories
    const orders = new InMemoryOrderRepository();
    const deals = new InMemoryDealRepository();

    // Pair metadata
    this.registry = new CurrencyPairRegistry(
      {
        ttlMs: appConfig.trading.marketCacheTtlMs,
        defaults: {
          dealQuota: new Decimal(appConfig.trading.dealQuota),
          profitMarkupPercent: new Decimal(appConfig.trading.profitMarkupPercent),
          maxOpenDeals: appConfig.trading.maxOpenDeals,
        },
      },
      this.gateway
    );

    // Core services
    this.orderService = new OrderService(
      {
        retryAttempts: appConfig.orders.retryAttempts,
        retryBaseDelayMs: appConfig.orders.retryBaseDelayMs,
        retryBackoffFactor: appConfig.orders.retryBackoffFactor,
      },
      this.gateway,
      orders
    );
    this.dealService = new DealService(this.gateway, deals, orders, this.orderService);
    this.executionService = new OrderExecutionService(this.orderService, this.dealService);
    this.strategyEngine = new StrategyEngine(this.registry, deals, this.executionService);

    // Monitors
    const timeoutService = new OrderTimeoutService(
      {
        maxRecreationsPerDeal: appConfig.recreation.maxRecreationsPerDeal,
        minMinutesBetweenRecreations: appConfig.recreation.minMinutesBetweenRecreations,
        repriceFactor: appConfig.recreation.repriceFactor,
      },
      this.orderService,
      this.dealService,
      this.gateway
    );
    this.buyOrderMonitor = new BuyOrderMonitor(
      {
        enabled: appConfig.buyMonitor.enabled,
        checkIntervalMs: appConfig.buyMonitor.checkIntervalMs,
        gracePeriodMs: appConfig.buyMonitor.gracePeriodMs,
        summaryIntervalMs: appConfig.buyMonitor.summaryIntervalMs,
      },
      this.orderService,
      this.gateway,
      StalenessPolicy.fromConfig(appConfig.buyMonitor),
      timeoutService
    );
    this.orderSyncMonitor = new OrderSyncMonitor(appConfig.orderSync, this.orderService);
    this.dealCompletionMonitor = new DealCompletionMonitor(appConfig.dealCompletion, this.dealService);

    // Output
    this.notificationService = new NotificationService({
      enabled: appConfig.telegram.enabled,
      botToken: appConfig.telegram.botToken,
      chatId: appConfig.telegram.chatId,
      retryAttempts: 3,
      retryDelayMs: 1000,
    });
    this.dashboard = new DashboardServer(appConfig.dashboard, {
      exchange: this.gateway.name,
      dealService: this.dealService,
      orderService: this.orderService,
      executionService: this.executionService,
      strategyEngine: this.strategyEngine,
      monitors: () => this.getMonitorStatus(),
    });

    this.setupEventPipeline();
  }

  /**
   * Setup the event-driven pipeline connecting all modules
   */
  private setupEventPipeline(): void {
    this.setupExecutionEvents();
    this.setupDealEvents();
    this.setupDashboardEvents();
    this.setupErrorHandlers();
  }

  private setupExecutionEvents(): void {
    this.executionService.on('executionCompleted', async (report) => {
      const deal = report.dealId !== null ? this.dealService.getDeal(report.dealId) : undefined;
      if (deal) {
        await this.notificationService.notifyDealOpened(deal);
      }
    });

    this.executionService.on('executionFailed', async (report) => {
      await this.notificationService.notifyExecutionFailed(report);
    });

    this.executionService.on('emergencyCancel', (order, result) => {
      logger.warn('Emergency cancel performed', {
        orderId: order.id,
        outcome: result.outcome,
        error: result.error,
      });
    });
  }

  private setupDealEvents(): void {
    this.dealService.on('dealClosed', async (deal) => {
      await this.notificationService.notifyDealClosed(deal);
    });

    this.dealService.on('dealCanceled', async (deal, reason) => {
      await this.notificationService.notifyDealCanceled(deal, reason);
    });

    this.dealService.on('buyOrderReplaced', async (deal, previous, replacement) => {
      await this.notificationService.notifyBuyOrderReplaced(deal, previous, replacement);
    });

    this.buyOrderMonitor.on('orderRemediated', (result) => {
      if (result.outcome === 'cancel_failed' || result.outcome === 'recreation_failed') {
        logger.error('Stale order remediation failed', {
          orderId: result.order.id,
          outcome: result.outcome,
          detail: result.detail,
        });
      }
    });
  }

  private setupDashboardEvents(): void {
    this.orderService.on('orderPlaced', (order) => this.dashboard.publishOrder(order));
    this.orderService.on('orderUpdated', (order) => this.dashboard.publishOrder(order));
    this.orderService.on('orderCanceled', (order) => this.dashboard.publishOrder(order));
    this.orderService.on('orderFailed', (order) => this.dashboard.publishOrder(order));

    this.dealService.on('dealCreated', (deal) => this.dashboard.publishDeal(deal));
    this.dealService.on('dealClosed', (deal) => this.dashboard.publishDeal(deal));
    this.dealService.on('dealCanceled', (deal) => this.dashboard.publishDeal(deal));
    this.dealService.on('buyOrderReplaced', (deal) => this.dashboard.publishDeal(deal));
    this.dealService.on('sellOrderPlaced', (deal) => this.dashboard.publishDeal(deal));
  }

  private setupErrorHandlers(): void {
    this.strategyEngine.on('error', async (error) => {
      logger.error('Strategy Engine error', { error: error.message });
      await this.notificationService.sendErrorNotification('StrategyEngine', error.message);
    });

    this.notificationService.on('error', (error) => {
      logger.error('Notification Service error', { error: error.message });
    });
  }

  /**
   * Start the application
   */
  public async start(): Promise<void> {
    logger.info('Starting deal execution engine', {
      exchange: this.gateway.name,
      symbols: this.appConfig.trading.symbols,
      dashboardEnabled: this.appConfig.dashboard.enabled,
      telegramEnabled: this.appConfig.telegram.enabled,
    });

    // Step 1: Exchange connectivity
    const connected = await this.gateway.verifyConnection();
    if (!connected) {
      throw new Error(`Failed to verify ${this.gateway.name} exchange connection`);
    }

    // Step 2: Warm the pair cache
    for (const symbol of this.appConfig.trading.symbols) {
      try {
        const pair = await this.registry.getPair(symbol);
        logger.info('Trading pair loaded', {
          symbol: pair.symbol,
          priceStep: pair.priceStep.toString(),
          amountStep: pair.amountStep.toString(),
          minNotional: pair.minNotional.toString(),
        });
      } catch (error) {
        logger.warn('Failed to load trading pair', { symbol, error: errorMessage(error) });
      }
    }

    // Step 3: Dashboard
    await this.dashboard.start();

    // Step 4: Telegram
    const telegramOk = await this.notificationService.verifyConnection();
    if (!telegramOk) {
      throw new Error('Failed to verify Telegram connection');
    }
    await this.notificationService.sendStartupNotification(this.gateway.name, [...this.appConfig.trading.symbols]);

    // Step 5: Monitors
    this.orderSyncMonitor.start();
    this.dealCompletionMonitor.start();
    this.buyOrderMonitor.start();

    this.isRunning = true;
    this.dashboard.setRunning(true);
    logger.info('Deal execution engine started');
  }

  /**
   * Stop the application gracefully
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;

    logger.info('Stopping deal execution engine', { reason });
    this.isRunning = false;
    this.dashboard.setRunning(false);

    await Promise.all([this.buyOrderMonitor.stop(), this.orderSyncMonitor.stop(), this.dealCompletionMonitor.stop()]);

    const openDeals = this.dealService.getOpenDeals().length;
    if (openDeals > 0) {
      logger.warn('Open deals left on shutdown', { openDeals });
    }

    await this.notificationService.sendShutdownNotification(reason);
    await this.dashboard.stop();

    logger.info('Deal execution engine stopped');
  }

  private getMonitorStatus(): MonitorStatus[] {
    return [this.buyOrderMonitor.getStatus(), this.orderSyncMonitor.getStatus(), this.dealCompletionMonitor.getStatus()];
  }

  /**
   * Check if the application is running
   */
  public getStatus(): {
    isRunning: boolean;
    exchange: string;
    openDeals: number;
    openOrders: number;
    monitors: MonitorStatus[];
    dashboardClients: number;
  } {
    return {
      isRunning: this.isRunning,
      exchange: this.gateway.name,
      openDeals: this.dealService.getOpenDeals().length,
      openOrders: this.orderService.getOpenOrders().length,
      monitors: this.getMonitorStatus(),
      dashboardClients: this.dashboard.getConnectionCount(),
    };
  }
}

function createGateway(appConfig: Config): ExchangeGateway {
  if (appConfig.exchange.mode === 'binance') {
    if (!appConfig.exchange.apiKey || !appConfig.exchange.apiSecret) {
      throw new Error('BINANCE_API_KEY and BINANCE_API_SECRET are required when EXCHANGE_MODE=binance');
    }
    return new BinanceSpotGateway({
      apiKey: appConfig.exchange.apiKey,
      apiSecret: appConfig.exchange.apiSecret,
      testnet: appConfig.exchange.testnet,
      defaultFeePercent: appConfig.trading.defaultFeePercent,
    });
  }

  const paper = new PaperExchangeGateway();
  const seed = loadPaperSeed(appConfig.paper.marketsFile);
  seedPaperExchange(paper, seed);
  logger.info('Paper exchange seeded', {
    markets: seed.markets.map(({ market }) => market.symbol),
    balances: Object.fromEntries([...seed.balances].map(([currency, amount]) => [currency, amount.toString()])),
  });
  return paper;
}
