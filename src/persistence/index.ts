/**
 * Persistence Module
 */

export { InMemoryOrderRepository } from './InMemoryOrderRepository.js';
export { InMemoryDealRepository } from './InMemoryDealRepository.js';
export type { OrderRepository, DealRepository } from './types.js';
