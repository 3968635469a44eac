/**
 * Strategy Engine
 *
 * Signal boundary of the engine. Takes a trade decision from the signal
 * producer, sizes it with the Strategy Calculator and hands the result to
 * the Order Execution Service.
 */

import EventEmitter from 'eventemitter3';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { CurrencyPairRegistry } from '../market/CurrencyPairRegistry.js';
import type { DealRepository } from '../persistence/types.js';
import type { OrderExecutionService } from '../execution/OrderExecutionService.js';
import { StrategyCalculator } from './StrategyCalculator.js';
import type { DecisionOutcome, StrategyEngineEvents, TradeDecision } from './types.js';

export class StrategyEngine extends EventEmitter<StrategyEngineEvents> {
  private readonly registry: CurrencyPairRegistry;
  private readonly deals: DealRepository;
  private readonly execution: OrderExecutionService;
  private readonly calculator: StrategyCalculator;
  private readonly inProgress: Set<string> = new Set();

  constructor(
    registry: CurrencyPairRegistry,
    deals: DealRepository,
    execution: OrderExecutionService,
    calculator: StrategyCalculator = new StrategyCalculator()
  ) {
    super();
    this.registry = registry;
    this.deals = deals;
    this.execution = execution;
    this.calculator = calculator;
  }

  /**
   * Process a trade decision
   * This is the main entry point from the signal producer
   */
  public async processDecision(decision: TradeDecision): Promise<DecisionOutcome> {
    const symbol = decision.symbol.toUpperCase();

    // Guard: one decision per symbol at a time
    if (this.inProgress.has(symbol)) {
      return this.reject(symbol, 'A decision for this symbol is already being executed');
    }

    this.inProgress.add(symbol);
    try {
      const pair = await this.registry.getPair(symbol);

      // Guard: open deal limit
      const openDeals = this.deals.getOpenDeals(symbol).length;
      if (openDeals >= pair.maxOpenDeals) {
        return this.reject(symbol, `Open deal limit reached (${openDeals}/${pair.maxOpenDeals})`);
      }

      const outcome = this.calculator.calculateForPair(pair, decision.buyPrice, decision.budget);
      if (!outcome.ok) {
        return this.reject(symbol, outcome.reason);
      }

      const { result } = outcome;
      logger.info('Strategy calculated', {
        symbol,
        buyPrice: result.buyPrice.toString(),
        coinsToBuy: result.coinsToBuy.toString(),
        sellPrice: result.sellPrice.toString(),
        coinsToSell: result.coinsToSell.toString(),
        totalCost: result.info.totalCost.toString(),
        netProfit: result.info.netProfit.toString(),
      });
      this.emit('strategyCalculated', symbol, result);

      const report = await this.execution.executeTradingStrategy(pair, result);
      return {
        accepted: report.success,
        reason: report.error,
        result,
        report,
      };
    } catch (error) {
      const normalizedError = error instanceof Error ? error : new Error(String(error));
      logger.error('Strategy Engine error', { symbol, error: errorMessage(error) });
      this.emit('error', normalizedError);
      return this.reject(symbol, normalizedError.message);
    } finally {
      this.inProgress.delete(symbol);
    }
  }

  private reject(symbol: string, reason: string): DecisionOutcome {
    logger.info('Trade decision rejected', { symbol, reason });
    this.emit('strategyRejected', symbol, reason);
    return { accepted: false, reason, result: null, report: null };
  }
}
