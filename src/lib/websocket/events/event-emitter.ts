/**
 * EventEmitter
 * Typed event emitter with promise-based waiting
 */

import { logger } from '../../utils/logger';
import { createAbortError } from '../../utils/abort';

type EventCallback<T = unknown> = (data: T) => void;

export class EventEmitter<TEventMap extends Record<string, unknown> = Record<string, unknown>> {
  private listeners = new Map<keyof TEventMap, Set<EventCallback<never>>>();

  /**
   * Subscribe to an event. Returns the unsubscribe function.
   */
  on<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    let callbacks = this.listeners.get(event);
    if (!callbacks) {
      callbacks = new Set();
      this.listeners.set(event, callbacks);
    }
    callbacks.add(callback);

    return () => {
      this.off(event, callback);
    };
  }

  once<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    const onceCallback: EventCallback<TEventMap[K]> = (data) => {
      this.off(event, onceCallback);
      callback(data);
    };
    return this.on(event, onceCallback);
  }

  off<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): void {
    const callbacks = this.listeners.get(event);
    if (callbacks) {
      callbacks.delete(callback);
      if (callbacks.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Resolve with the next emission of `event`. Rejects with an AbortError
   * if `signal` aborts first.
   */
  waitFor<K extends keyof TEventMap>(event: K, signal?: AbortSignal): Promise<TEventMap[K]> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(createAbortError());
        return;
      }

      const onAbort = () => {
        unsubscribe();
        reject(createAbortError());
      };
      const unsubscribe = this.once(event, (data) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(data);
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Emit an event. Listener failures are logged and never reach the emitter.
   */
  emit<K extends keyof TEventMap>(event: K, data: TEventMap[K]): void {
    const callbacks = this.listeners.get(event);
    if (!callbacks) {
      return;
    }
    // Snapshot: listeners may unsubscribe while being called
    for (const callback of [...callbacks]) {
      try {
        (callback as EventCallback<TEventMap[K]>)(data);
      } catch (error) {
        logger.error(`Error in event listener for ${String(event)}`, error, { eventType: String(event) });
      }
    }
  }

  removeAllListeners<K extends keyof TEventMap>(event?: K): void {
    if (event) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  listenerCount<K extends keyof TEventMap>(event: K): number {
    return this.listeners.get(event)?.size ?? 0;
  }
}
