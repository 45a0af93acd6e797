/**
 * Timer lifecycle guard
 *
 * Owns a single periodic task. Starting again replaces the previous timer, so a
 * component can never leak an orphaned interval. Tick failures (sync throw or
 * rejected promise) are logged and the next tick still runs.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('health-sweep', logger);
 * guard.every(5_000, () => monitor.sweep());
 * // Later...
 * guard.clear();
 * ```
 */

import type { Logger } from 'pino';

export type TickFn = () => void | Promise<void>;

export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private readonly name: string;
  private readonly logger?: Logger;

  constructor(name = 'anonymous', logger?: Logger) {
    this.name = name;
    this.logger = logger;
  }

  /**
   * Run `tick` every `intervalMs` (clears any existing timer first)
   */
  every(intervalMs: number, tick: TickFn): void {
    this.clear();
    this.timer = setInterval(() => this.runTick(tick), intervalMs);
  }

  /**
   * Clear the timer if set. Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }

  private runTick(tick: TickFn): void {
    try {
      const result = tick();
      if (result instanceof Promise) {
        result.catch((err: unknown) => this.logTickError(err));
      }
    } catch (err) {
      this.logTickError(err);
    }
  }

  private logTickError(err: unknown): void {
    this.logger?.error({ err, timer: this.name }, 'Periodic task failed');
  }
}
