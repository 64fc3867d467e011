// ─────────────────────────────────────────────
//  Typed Event Bus
//  Each ledger / session owns its own instance; there is no
//  process-wide bus.
// ─────────────────────────────────────────────

type Listener<T> = (payload: T) => void;

type ListenerTable<M> = { [K in keyof M]?: Listener<M[K]>[] };

export class TypedEventBus<M extends object> {
  private listeners: ListenerTable<M> = {};

  on<K extends keyof M>(event: K, listener: Listener<M[K]>): () => void {
    const arr = this.listeners[event] ?? [];
    arr.push(listener);
    this.listeners[event] = arr;
    return () => this.off(event, listener);
  }

  off<K extends keyof M>(event: K, listener: Listener<M[K]>): void {
    const arr = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const arr = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  listenerCount<K extends keyof M>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  /** Remove all listeners */
  clear(): void {
    this.listeners = {};
  }
}
