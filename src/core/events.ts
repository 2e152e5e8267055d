/**
 * Event plumbing for the broker.
 * Typed listener registry; no business logic.
 */

import type { Logger } from '../logging/logger.js';

export type EventMap = Record<string, unknown>;
export type EventHandler<T> = (data: T) => void;

/**
 * Minimal typed emitter. Listener exceptions are logged and never reach
 * the code that emitted.
 */
export class TypedEventEmitter<Events extends EventMap> {
  private listeners: { [K in keyof Events]?: Set<EventHandler<Events[K]>> } = {};

  constructor(private readonly logger?: Logger) {}

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let set = this.listeners[event];
    if (!set) {
      set = new Set();
      this.listeners[event] = set;
    }
    set.add(handler);

    return () => this.off(event, handler);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const eventListeners = this.listeners[event];
    if (!eventListeners) return;
    for (const handler of [...eventListeners]) {
      try {
        handler(data);
      } catch (error) {
        this.logger?.error({ err: error, event: String(event) }, 'Error in event listener');
      }
    }
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const eventListeners = this.listeners[event];
    if (eventListeners) {
      eventListeners.delete(handler);
      if (eventListeners.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }
}
