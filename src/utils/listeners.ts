/**
 * Listener registry used for every push-style notification in the engine.
 *
 * Subscribing returns the unsubscribe function. A listener that throws is
 * logged and skipped.
 *
 * @module utils/listeners
 */

import type { LogTarget } from './logger';
import { toError } from './logger';

export type Unsubscribe = () => void;

export class ListenerSet<Args extends unknown[]> {
  private readonly listeners = new Set<(...args: Args) => void>();

  constructor(
    private readonly name: string,
    private readonly logger: LogTarget
  ) {}

  add(listener: (...args: Args) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(...args: Args): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(...args);
      } catch (err) {
        this.logger.error(`${this.name} listener threw`, toError(err));
      }
    }
  }

  get size(): number {
    return this.listeners.size;
  }

  clear(): void {
    this.listeners.clear();
  }
}
