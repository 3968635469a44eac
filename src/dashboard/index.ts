/**
 * Dashboard Module
 *
 * REST and WebSocket status server.
 */

// Types
export type {
  DashboardConfig,
  SystemStatus,
  DealDetail,
  SignalRequest,
  WsMessage,
  WsMessageType,
} from './types.js';

// Classes
export { DashboardServer } from './DashboardServer.js';
export type { DashboardSources } from './DashboardServer.js';
