/**
 * Minimal typed event emitter: one Set of handlers per event name.
 *
 * @module events
 */

export type Unsubscribe = () => void;

type HandlerMap<E> = { [K in keyof E]?: Set<(payload: E[K]) => void> };

export class TypedEmitter<E> {
  private handlers: HandlerMap<E> = {};

  /**
   * @param onListenerError receives exceptions thrown by handlers; without
   *   it they propagate to the emitter.
   */
  constructor(
    private readonly onListenerError?: (err: unknown, event: keyof E) => void,
  ) {}

  on<K extends keyof E>(event: K, handler: (payload: E[K]) => void): Unsubscribe {
    const set = this.handlers[event] ?? new Set<(payload: E[K]) => void>();
    set.add(handler);
    this.handlers[event] = set;
    return () => {
      set.delete(handler);
    };
  }

  emit<K extends keyof E>(event: K, payload: E[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (err) {
        if (!this.onListenerError) throw err;
        this.onListenerError(err, event);
      }
    }
  }

  removeAll(): void {
    this.handlers = {};
  }
}
