import type { WirecallError } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

export interface RequestEvent {
  log: string;
}

export interface ResponseEvent {
  /** Response log on success, full error message on failure. */
  message: string;
}

export interface SuccessEvent {
  statusCode: number | null;
}

export interface FailEvent {
  message: string;
  error: WirecallError;
}

export interface TransportEventMap {
  request: RequestEvent;
  response: ResponseEvent;
  success: SuccessEvent;
  fail: FailEvent;
}

export type TransportEventName = keyof TransportEventMap;

export type Listener<T> = (event: T) => void | Promise<void>;

/**
 * Typed listener registry. Listeners run in registration order and async listeners are awaited.
 */
export class LifecycleEmitter<M extends object = TransportEventMap> {
  private readonly listeners: { [K in keyof M]?: Array<Listener<M[K]>> } = {};

  constructor(private readonly logger: Logger = silentLogger) {}

  on<K extends keyof M>(event: K, listener: Listener<M[K]>): () => void {
    const registered = this.listeners[event] ?? [];
    registered.push(listener);
    this.listeners[event] = registered;
    return () => this.off(event, listener);
  }

  off<K extends keyof M>(event: K, listener: Listener<M[K]>): void {
    const registered = this.listeners[event];
    if (!registered) {
      return;
    }

    const index = registered.indexOf(listener);
    if (index >= 0) {
      registered.splice(index, 1);
    }
  }

  listenerCount<K extends keyof M>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  async emit<K extends keyof M>(event: K, payload: M[K]): Promise<void> {
    const registered = [...(this.listeners[event] ?? [])];

    for (const listener of registered) {
      try {
        await listener(payload);
      } catch (error) {
        this.logger.error(`Listener for "${String(event)}" failed`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
