import { EventEmitter } from "node:events";

/**
 * Event emitter over node:events with payload types keyed by event name.
 *
 * ```ts
 * interface ConnectionEvents {
 *   state: { from: ConnectionState; to: ConnectionState };
 * }
 * class ConnectionManager extends TypedEventEmitter<ConnectionEvents> {}
 * ```
 *
 * Each event carries a single payload. Listeners run synchronously inside
 * {@link emit}, so a throwing listener propagates to the emitter.
 */
export class TypedEventEmitter<TEvents extends object> {
  private readonly emitter = new EventEmitter();

  constructor(maxListeners = 20) {
    this.emitter.setMaxListeners(maxListeners);
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
