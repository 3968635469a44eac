/**
 * Dashboard Server
 *
 * REST API and WebSocket feed for watching the engine: deals, orders,
 * statistics and monitor health. POST /api/signals hands a trade decision
 * to the Strategy Engine.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import fastifyWebsocket from '@fastify/websocket';
import { WebSocket } from 'ws';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { Deal } from '../deals/Deal.js';
import type { DealService } from '../deals/DealService.js';
import type { OrderExecutionService } from '../execution/OrderExecutionService.js';
import type { MonitorStatus } from '../monitoring/types.js';
import type { Order } from '../orders/Order.js';
import type { OrderService } from '../orders/OrderService.js';
import type { StrategyEngine } from '../strategy/StrategyEngine.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { DashboardConfig, DealDetail, SignalRequest, SystemStatus, WsMessage } from './types.js';

export interface DashboardSources {
  exchange: string;
  dealService: DealService;
  orderService: OrderService;
  executionService: OrderExecutionService;
  strategyEngine: StrategyEngine;
  monitors: () => MonitorStatus[];
}

const signalSchema = {
  body: {
    type: 'object',
    required: ['symbol', 'buyPrice'],
    properties: {
      symbol: { type: 'string', minLength: 1 },
      buyPrice: { type: ['string', 'number'] },
      budget: { type: ['string', 'number'] },
    },
  },
} as const;

export class DashboardServer {
  private readonly server: FastifyInstance;
  private readonly config: DashboardConfig;
  private readonly sources: DashboardSources;
  private readonly clock: Clock;
  private readonly startTime: number;
  private clients: Set<WebSocket> = new Set();
  private isRunning = false;
  private lastUpdate: number;
  private ready: Promise<void> | null = null;

  constructor(config: DashboardConfig, sources: DashboardSources, clock: Clock = systemClock) {
    this.config = config;
    this.sources = sources;
    this.clock = clock;
    this.startTime = clock();
    this.lastUpdate = this.startTime;
    this.server = Fastify({ logger: false });
  }

  private get uptime(): number {
    return this.clock() - this.startTime;
  }

  /**
   * Register plugins and routes once
   */
  setup(): Promise<void> {
    if (!this.ready) {
      this.ready = this.registerAll();
    }
    return this.ready;
  }

  /**
   * Initialize and start the server
   */
  async start(): Promise<void> {
    if (!this.config.enabled) {
      logger.info('Dashboard server is disabled');
      return;
    }

    await this.setup();

    try {
      await this.server.listen({
        port: this.config.port,
        host: this.config.host,
      });
      logger.info('Dashboard server started', {
        url: `http://${this.config.host}:${this.config.port}`,
      });
    } catch (error) {
      logger.error('Failed to start dashboard server', { error: errorMessage(error) });
      throw error;
    }
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    for (const client of this.clients) {
      client.close();
    }
    this.clients.clear();

    await this.server.close();
    logger.info('Dashboard server stopped');
  }

  /**
   * Underlying Fastify instance, for inject() in tests
   */
  get app(): FastifyInstance {
    return this.server;
  }

  private async registerAll(): Promise<void> {
    await this.server.register(fastifyWebsocket);
    this.registerRoutes();
    this.registerWebSocket();
  }

  /**
   * Register REST API routes
   */
  private registerRoutes(): void {
    this.server.get('/api/health', async () => {
      return { status: 'ok', uptime: this.uptime };
    });

    this.server.get('/api/status', async () => this.getStatus());

    this.server.get('/api/deals', async () => {
      return this.sources.dealService.getAllDeals().map((deal) => deal.toDict());
    });

    this.server.get<{ Params: { id: string } }>('/api/deals/:id', async (request, reply) => {
      const deal = this.sources.dealService.getDeal(request.params.id);
      if (!deal) {
        return reply.code(404).send({ error: 'Deal not found' });
      }
      const detail: DealDetail = {
        deal: deal.toDict(),
        orders: deal.orders.map((order) => order.toDict()),
      };
      return detail;
    });

    this.server.get<{ Querystring: { open?: string } }>('/api/orders', async (request) => {
      const orders =
        request.query.open === 'true'
          ? this.sources.orderService.getOpenOrders()
          : this.sources.orderService.getAllOrders();
      return orders.map((order) => order.toDict());
    });

    this.server.post<{ Body: SignalRequest }>('/api/signals', { schema: signalSchema }, async (request, reply) => {
      const { symbol, buyPrice, budget } = request.body;
      logger.info('Signal received from dashboard', { symbol, buyPrice, budget });

      const outcome = await this.sources.strategyEngine.processDecision({ symbol, buyPrice, budget });
      return reply.code(outcome.accepted ? 201 : 422).send({
        accepted: outcome.accepted,
        reason: outcome.reason,
        dealId: outcome.report?.dealId ?? null,
        buyOrderId: outcome.report?.buyOrder?.id ?? null,
        sellOrderId: outcome.report?.sellOrder?.id ?? null,
      });
    });
  }

  /**
   * Register WebSocket handler
   */
  private registerWebSocket(): void {
    this.server.get('/ws', { websocket: true }, (socket) => {
      this.clients.add(socket);
      logger.debug('WebSocket client connected', {
        totalClients: this.clients.size,
      });

      this.sendToClient(socket, {
        type: 'status',
        data: this.getStatus(),
        timestamp: this.clock(),
      });

      socket.on('close', () => {
        this.clients.delete(socket);
        logger.debug('WebSocket client disconnected', {
          totalClients: this.clients.size,
        });
      });

      socket.on('error', (error: Error) => {
        logger.error('WebSocket client error', { error: error.message });
        this.clients.delete(socket);
      });
    });
  }

  private sendToClient(client: WebSocket, message: WsMessage): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(message));
    }
  }

  private broadcast(message: WsMessage): void {
    const payload = JSON.stringify(message);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  // ==========================================
  // State Update Methods (called from App)
  // ==========================================

  publishOrder(order: Order): void {
    this.lastUpdate = this.clock();
    this.broadcast({ type: 'order', data: order.toDict(), timestamp: this.lastUpdate });
  }

  publishDeal(deal: Deal): void {
    this.lastUpdate = this.clock();
    this.broadcast({ type: 'deal', data: deal.toDict(), timestamp: this.lastUpdate });
  }

  setRunning(isRunning: boolean): void {
    this.isRunning = isRunning;
    this.lastUpdate = this.clock();
    this.broadcast({ type: 'status', data: this.getStatus(), timestamp: this.lastUpdate });
  }

  getStatus(): SystemStatus {
    return {
      isRunning: this.isRunning,
      exchange: this.sources.exchange,
      uptime: this.uptime,
      lastUpdate: this.lastUpdate,
      deals: this.sources.dealService.getStatistics(),
      orders: this.sources.orderService.getStatistics(),
      execution: this.sources.executionService.getExecutionStatistics(),
      monitors: this.sources.monitors(),
    };
  }

  getConnectionCount(): number {
    return this.clients.size;
  }
}
