/**
 * Deal Factory
 */

import { randomUUID } from 'node:crypto';
import { systemClock, type Clock } from '../utils/clock.js';
import { Deal } from './Deal.js';
import type { CurrencyPair } from '../market/types.js';

export class DealFactory {
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(clock: Clock = systemClock, generateId: () => string = randomUUID) {
    this.clock = clock;
    this.generateId = generateId;
  }

  /** New OPEN deal without orders */
  create(pair: CurrencyPair): Deal {
    return new Deal({
      id: this.generateId(),
      pair,
      createdAt: this.clock(),
    });
  }
}
