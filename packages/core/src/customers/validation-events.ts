/**
 * Typed event emitter for validation state broadcasts
 */

type Listener<T> = (payload: T) => void;

export class TypedEventEmitter<Events extends Record<string, unknown>> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  on<K extends keyof Events>(event: K, callback: Listener<Events[K]>): () => void {
    const existing = this.listeners[event];
    const listeners = existing ?? new Set<Listener<Events[K]>>();
    if (!existing) {
      this.listeners[event] = listeners;
    }
    listeners.add(callback);
    return () => this.off(event, callback);
  }

  off<K extends keyof Events>(event: K, callback: Listener<Events[K]>): void {
    this.listeners[event]?.delete(callback);
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    this.listeners[event]?.forEach((cb) => cb(payload));
  }
}
