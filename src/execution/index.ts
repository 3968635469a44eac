/**
 * Execution Module
 */

export { OrderExecutionService } from './OrderExecutionService.js';
export { StrategyResultValidator } from './StrategyResultValidator.js';
export type {
  ValidatedStrategy,
  ValidationResult,
  ExecutionReport,
  ExecutionStatistics,
  EmergencyStopReport,
  ExecutionEvents,
} from './types.js';
