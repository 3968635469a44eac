/**
 * Dashboard Types
 *
 * Type definitions for the status dashboard.
 */

import type { DealRecord, DealStatistics } from '../deals/types.js';
import type { ExecutionStatistics } from '../execution/types.js';
import type { MonitorStatus } from '../monitoring/types.js';
import type { OrderRecord, OrderStatistics } from '../orders/types.js';

/**
 * Dashboard server configuration
 */
export interface DashboardConfig {
  enabled: boolean;
  port: number;
  host: string;
}

/**
 * Engine status snapshot
 */
export interface SystemStatus {
  isRunning: boolean;
  exchange: string;
  uptime: number;
  lastUpdate: number;
  deals: DealStatistics;
  orders: OrderStatistics;
  execution: ExecutionStatistics;
  monitors: MonitorStatus[];
}

/**
 * Deal with its orders, as served by GET /api/deals/:id
 */
export interface DealDetail {
  deal: DealRecord;
  orders: OrderRecord[];
}

/**
 * POST /api/signals body
 */
export interface SignalRequest {
  symbol: string;
  buyPrice: string | number;
  budget?: string | number;
}

/**
 * WebSocket message types
 */
export type WsMessageType = 'order' | 'deal' | 'status';

/**
 * WebSocket message payload
 */
export interface WsMessage<T = unknown> {
  type: WsMessageType;
  data: T;
  timestamp: number;
}
