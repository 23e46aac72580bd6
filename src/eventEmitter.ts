type Listener<A extends unknown[]> = (...args: A) => void;

/**
 * Strongly-typed event emitter. `T` maps each event name to its argument
 * tuple.
 *
 * Listeners run synchronously in registration order. A listener added or
 * removed while an event is being emitted takes effect from the next emit.
 */
export class EventEmitter<
  T extends Record<string, unknown[]> = Record<string, unknown[]>,
> {
  #listeners: { [K in keyof T]?: Set<Listener<T[K]>> } = {};

  #set<K extends keyof T>(event: K): Set<Listener<T[K]>> {
    const existing = this.#listeners[event];
    if (existing) return existing;
    const created = new Set<Listener<T[K]>>();
    this.#listeners[event] = created;
    return created;
  }

  /** Subscribe to `event`. Returns a function that unsubscribes. */
  on<K extends keyof T>(event: K, listener: Listener<T[K]>): () => void {
    this.#set(event).add(listener);
    return () => this.off(event, listener);
  }

  /** Subscribe for the next emission of `event` only. */
  once<K extends keyof T>(event: K, listener: Listener<T[K]>): () => void {
    const wrapper: Listener<T[K]> = (...args) => {
      this.off(event, wrapper);
      listener(...args);
    };
    return this.on(event, wrapper);
  }

  off<K extends keyof T>(event: K, listener: Listener<T[K]>): void {
    this.#set(event).delete(listener);
  }

  emit<K extends keyof T>(event: K, ...args: T[K]): void {
    for (const listener of [...this.#set(event)]) {
      listener(...args);
    }
  }

  listenerCount<K extends keyof T>(event: K): number {
    return this.#listeners[event]?.size ?? 0;
  }
}
