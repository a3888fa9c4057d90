/**
 * Typed event emitter for the solitaire engine.
 *
 * Zero-dependency and host-agnostic: the emitter is generic over an
 * event map (event name -> payload type), so each game defines its own
 * events while sharing the subscription mechanics. Subscribing to a
 * name that is not in the map is a compile-time error.
 *
 * Hosts (renderers, network relays, transcript tools) subscribe to
 * these events to stay in sync with the engine without polling.
 */

/** A callback for one event of the map `M`. */
export type GameEventListener<M, K extends keyof M> = (payload: M[K]) => void;

type ListenerTable<M> = {
  [K in keyof M]?: Array<GameEventListener<M, K>>;
};

/**
 * A minimal, typed event emitter.
 *
 * Usage:
 * ```ts
 * interface Events { 'move-applied': { moveCount: number } }
 * const emitter = new GameEventEmitter<Events>();
 * emitter.on('move-applied', ({ moveCount }) => render(moveCount));
 * emitter.emit('move-applied', { moveCount: 1 });
 * ```
 */
export class GameEventEmitter<M extends object> {
  private listeners: ListenerTable<M> = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends keyof M>(
    event: K,
    listener: GameEventListener<M, K>,
  ): () => void {
    const list = this.listeners[event];
    if (list) {
      list.push(listener);
    } else {
      this.listeners[event] = [listener];
    }

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends keyof M>(
    event: K,
    listener: GameEventListener<M, K>,
  ): () => void {
    const wrapper: GameEventListener<M, K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends keyof M>(event: K, listener: GameEventListener<M, K>): void {
    const list = this.listeners[event];
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const list = this.listeners[event];
    if (!list || list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: keyof M): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: keyof M): number {
    const list = this.listeners[event];
    return list ? list.length : 0;
  }
}
