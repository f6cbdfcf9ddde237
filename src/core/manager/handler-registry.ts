/**
 * ID-based handler registration
 *
 * Subscribers get back an opaque ID; the registry holds the handlers and
 * nothing holds the registry, so disposing a subscription is all the
 * teardown a subscriber needs.
 */

import { v7 as uuidv7 } from 'uuid';
import { toError } from '../../shared/errors.js';
import type { Logger } from '../../shared/logger.js';

export interface Subscription {
  readonly id: string;
  dispose(): void;
}

export type Handler<Args extends unknown[]> = (...args: Args) => void | Promise<void>;

export class HandlerRegistry<Args extends unknown[]> {
  private handlers = new Map<string, Handler<Args>>();

  constructor(
    private readonly name: string,
    private readonly logger: Logger,
  ) {}

  add(handler: Handler<Args>): Subscription {
    const id = uuidv7();
    this.handlers.set(id, handler);
    return {
      id,
      dispose: () => {
        this.handlers.delete(id);
      },
    };
  }

  remove(id: string): boolean {
    return this.handlers.delete(id);
  }

  get size(): number {
    return this.handlers.size;
  }

  /** Call every handler in registration order. A throwing handler does not stop the others. */
  async emit(...args: Args): Promise<void> {
    for (const [id, handler] of [...this.handlers]) {
      try {
        await handler(...args);
      } catch (err) {
        this.logger.error(`${this.name} handler ${id} failed: ${toError(err).message}`);
      }
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}
