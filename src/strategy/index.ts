export { StrategyEngine } from './StrategyEngine.js';
export { StrategyCalculator, MIN_PROFIT_RATIO } from './StrategyCalculator.js';
export type {
  CalculatorInput,
  CalculationOutcome,
  StrategyInfo,
  StrategyResult,
  StrategyTuple,
  TradeDecision,
  DecisionOutcome,
  StrategyEngineEvents,
} from './types.js';
