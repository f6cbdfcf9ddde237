/**
 * Keyed debouncer
 * Coalesces bursts of triggers for the same key into one delayed action.
 */

import { createLogger, type Logger } from '../../shared/logger.js';

export type DebouncedAction = () => void | Promise<void>;

interface PendingAction {
  timer: ReturnType<typeof setTimeout>;
  action: DebouncedAction;
}

export class Debouncer {
  private pending: Map<string, PendingAction> = new Map();
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('Debouncer')) {
    this.logger = logger;
  }

  /**
   * Run `action` once, `delayMs` after the last call for `key`.
   * Repeated calls within the delay reset the timer and replace the action.
   */
  schedule(key: string, delayMs: number, action: DebouncedAction): void {
    const existing = this.pending.get(key);
    if (existing) {
      clearTimeout(existing.timer);
    }

    const timer = setTimeout(() => {
      this.pending.delete(key);
      this.run(key, action);
    }, delayMs);

    this.pending.set(key, { timer, action });
  }

  /** Drop the pending action for `key` without running it. */
  cancel(key: string): boolean {
    const existing = this.pending.get(key);
    if (!existing) return false;
    clearTimeout(existing.timer);
    this.pending.delete(key);
    return true;
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  /** Clear all pending timers */
  clear(): void {
    for (const { timer } of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
  }

  /** Number of pending debounced actions */
  get pendingCount(): number {
    return this.pending.size;
  }

  private run(key: string, action: DebouncedAction): void {
    Promise.resolve()
      .then(action)
      .catch((err: unknown) => {
        this.logger.error(
          `Debounced action for ${key} failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      });
  }
}
