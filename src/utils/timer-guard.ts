/**
 * Timer Lifecycle Management Guards
 *
 * Every set() clears the previous timer, and async callbacks route their
 * rejections to an error handler instead of leaving them unhandled.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('evaluate:plan-1', (err) => logger.error(err));
 * guard.set(() => controller.evaluate(planId), 60_000);
 * // Later...
 * guard.clear();
 * ```
 */

export type TimerTask = () => void | Promise<void>;
export type TimerErrorHandler = (error: unknown, name: string) => void;

/**
 * Single timer guard
 */
export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private readonly name: string;
  private readonly onError?: TimerErrorHandler;

  constructor(name = 'anonymous', onError?: TimerErrorHandler) {
    this.name = name;
    this.onError = onError;
  }

  /**
   * Set a new one-shot timer (clears existing timer first)
   */
  set(task: TimerTask, delayMs: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.run(task);
    }, delayMs);
  }

  /**
   * Set an interval (clears existing timer first)
   */
  setInterval(task: TimerTask, intervalMs: number): void {
    this.clear();
    this.timer = setInterval(() => this.run(task), intervalMs);
  }

  /**
   * Clear the timer if set. Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer); // Works for both setTimeout and setInterval
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }

  private run(task: TimerTask): void {
    try {
      const result = task();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.handleError(error));
      }
    } catch (error) {
      this.handleError(error);
    }
  }

  private handleError(error: unknown): void {
    if (this.onError) {
      this.onError(error, this.name);
      return;
    }
    // Rethrow asynchronously when no handler is set
    queueMicrotask(() => {
      throw error;
    });
  }
}

/**
 * Multiple timer guard, one named timer per key
 *
 * Controllers keep one of these and key timers by plan or endpoint id.
 */
export class MultiTimerGuard {
  private timers = new Map<string, TimerGuard>();
  private readonly onError?: TimerErrorHandler;

  constructor(onError?: TimerErrorHandler) {
    this.onError = onError;
  }

  /**
   * Set a named one-shot timer; the entry is dropped once it fires
   */
  set(name: string, task: TimerTask, delayMs: number): void {
    const guard = this.timers.get(name) ?? new TimerGuard(name, this.onError);
    guard.set(() => {
      if (this.timers.get(name) === guard && !guard.isActive()) {
        this.timers.delete(name);
      }
      return task();
    }, delayMs);
    this.timers.set(name, guard);
  }

  /**
   * Set a named interval
   */
  setInterval(name: string, task: TimerTask, intervalMs: number): void {
    const guard = this.timers.get(name) ?? new TimerGuard(name, this.onError);
    guard.setInterval(task, intervalMs);
    this.timers.set(name, guard);
  }

  clear(name: string): void {
    this.timers.get(name)?.clear();
    this.timers.delete(name);
  }

  clearAll(): void {
    for (const name of Array.from(this.timers.keys())) {
      this.clear(name);
    }
  }

  has(name: string): boolean {
    return this.timers.get(name)?.isActive() ?? false;
  }

  getActiveCount(): number {
    let count = 0;
    for (const guard of this.timers.values()) {
      if (guard.isActive()) {
        count++;
      }
    }
    return count;
  }

  getTimerNames(): string[] {
    return Array.from(this.timers.keys());
  }
}
