/**
 * TickLoop - Timer-driven tick source for motion schedulers
 *
 * Runs handlers `tickRate` times per second on a Node timer. The loop
 * starts with the first handler and stops when the last one is removed.
 */

import type { Clock } from 'waypoint-motion';
import type { TickHandler, Unsubscribe } from './types.js';

/**
 * Configuration for TickLoop
 */
export interface TickLoopConfig {
  /** Ticks per second (default: 30) */
  tickRate?: number;
  /** Millisecond clock passed to handlers (default: performance.now) */
  clock?: Clock;
  /** Enable debug logging (default: false) */
  debug?: boolean;
}

export class TickLoop {
  private readonly tickDurationMs: number;
  private readonly clock: Clock;
  private readonly debug: boolean;

  private timer: NodeJS.Timeout | null = null;
  private lastTickTime: number = 0;
  private handlers: Set<TickHandler> = new Set();

  constructor(config: TickLoopConfig = {}) {
    const tickRate = config.tickRate ?? 30;
    if (!(tickRate > 0)) {
      throw new Error(`Invalid tickRate: ${tickRate}. Must be positive.`);
    }
    this.tickDurationMs = 1000 / tickRate;
    this.clock = config.clock ?? (() => performance.now());
    this.debug = config.debug ?? false;
  }

  /**
   * Register a tick handler.
   * Automatically starts the loop when the first handler is added.
   * @returns Unsubscribe function
   */
  onTick(handler: TickHandler): Unsubscribe {
    this.handlers.add(handler);

    if (this.handlers.size === 1) {
      this.start();
    }

    return () => {
      this.handlers.delete(handler);
      // Stop the loop when no handlers remain
      if (this.handlers.size === 0) {
        this.stop();
      }
    };
  }

  start(): void {
    if (this.timer !== null) return;

    this.lastTickTime = this.clock();
    this.timer = setInterval(() => this.runTick(), this.tickDurationMs);

    if (this.debug) {
      console.log(`[TickLoop] Started (${this.tickDurationMs.toFixed(1)}ms per tick)`);
    }
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;

      if (this.debug) {
        console.log('[TickLoop] Stopped');
      }
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getTickDurationMs(): number {
    return this.tickDurationMs;
  }

  /**
   * Run every handler once with the current clock reading
   */
  runTick(): void {
    const now = this.clock();
    const dt = (now - this.lastTickTime) / 1000;
    this.lastTickTime = now;

    for (const handler of Array.from(this.handlers)) {
      try {
        handler(now, dt);
      } catch (error) {
        console.error('[TickLoop] Error in tick handler:', error);
      }
    }
  }

  /**
   * Clear all handlers and stop the loop
   */
  dispose(): void {
    this.stop();
    this.handlers.clear();
  }
}
