/**
 * EventStream
 * A multicast, completable sequence of values. Values reach every
 * subscriber synchronously and in emission order.
 */

import { logger } from '../../utils/logger';

export interface StreamObserver<T> {
  next: (value: T) => void;
  complete?: () => void;
}

export class EventStream<T extends object> implements AsyncIterable<T> {
  private observers = new Set<StreamObserver<T>>();
  private completed = false;

  get isCompleted(): boolean {
    return this.completed;
  }

  /**
   * Subscribe with an observer or a bare `next` callback. Subscribing to a
   * completed stream calls `complete` right away.
   */
  subscribe(observer: StreamObserver<T> | ((value: T) => void)): () => void {
    const normalized: StreamObserver<T> = typeof observer === 'function' ? { next: observer } : observer;

    if (this.completed) {
      normalized.complete?.();
      return () => undefined;
    }

    this.observers.add(normalized);
    return () => {
      this.observers.delete(normalized);
    };
  }

  emit(value: T): void {
    if (this.completed) {
      return;
    }
    for (const observer of [...this.observers]) {
      try {
        observer.next(value);
      } catch (error) {
        logger.error('Error in event stream subscriber', error);
      }
    }
  }

  complete(): void {
    if (this.completed) {
      return;
    }
    this.completed = true;
    const observers = [...this.observers];
    this.observers.clear();
    for (const observer of observers) {
      try {
        observer.complete?.();
      } catch (error) {
        logger.error('Error in event stream completion handler', error);
      }
    }
  }

  /**
   * Iterate values emitted after this call. Values are buffered per
   * iterator, so a slow consumer never loses or reorders events.
   */
  [Symbol.asyncIterator](): AsyncIterator<T> {
    const buffered: T[] = [];
    let waiting: ((result: IteratorResult<T>) => void) | null = null;
    let done = this.completed;
    let unsubscribe: () => void = () => undefined;

    const finish = () => {
      done = true;
      unsubscribe();
      if (waiting) {
        const resolve = waiting;
        waiting = null;
        resolve({ value: undefined, done: true });
      }
    };

    unsubscribe = this.subscribe({
      next: (value) => {
        if (waiting) {
          const resolve = waiting;
          waiting = null;
          resolve({ value, done: false });
        } else {
          buffered.push(value);
        }
      },
      complete: finish,
    });

    return {
      next: () => {
        const value = buffered.shift();
        if (value !== undefined) {
          return Promise.resolve({ value, done: false });
        }
        if (done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          waiting = resolve;
        });
      },
      return: () => {
        finish();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
