/**
 * Polling Loop
 *
 * Long-lived check/sleep cycle shared by all monitors. A failing tick is
 * logged and the loop continues. stop() interrupts the sleep and waits for
 * the tick in flight to finish.
 */

import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { MonitorStatus } from './types.js';

export class PollingLoop {
  private readonly name: string;
  private readonly intervalMs: number;
  private readonly tick: () => Promise<void>;
  private readonly clock: Clock;
  private running = false;
  private loop: Promise<void> | null = null;
  private wakeUp: (() => void) | null = null;
  private ticks = 0;
  private errors = 0;
  private lastTickAt: number | null = null;

  constructor(name: string, intervalMs: number, tick: () => Promise<void>, clock: Clock = systemClock) {
    this.name = name;
    this.intervalMs = intervalMs;
    this.tick = tick;
    this.clock = clock;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      logger.warn(`${this.name} already running`);
      return;
    }
    this.running = true;
    this.loop = this.run();
    logger.info(`${this.name} started`, { intervalMs: this.intervalMs });
  }

  async stop(): Promise<void> {
    if (!this.running && !this.loop) return;

    this.running = false;
    this.wakeUp?.();
    const loop = this.loop;
    this.loop = null;
    if (loop) {
      await loop;
    }
    logger.info(`${this.name} stopped`);
  }

  /**
   * Run a single tick outside the schedule
   */
  async runOnce(): Promise<void> {
    this.lastTickAt = this.clock();
    try {
      await this.tick();
      this.ticks += 1;
    } catch (error) {
      this.errors += 1;
      logger.error(`${this.name} iteration failed`, { error: errorMessage(error) });
    }
  }

  getStatus(): MonitorStatus {
    return {
      name: this.name,
      running: this.running,
      ticks: this.ticks,
      errors: this.errors,
      lastTickAt: this.lastTickAt,
    };
  }

  private async run(): Promise<void> {
    while (this.running) {
      await this.runOnce();
      if (!this.running) break;
      await this.sleep(this.intervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => this.wakeUp?.(), ms);
      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }
}
