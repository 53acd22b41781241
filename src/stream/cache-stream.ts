import * as logger from '../logging';
import type { PartialObserver, StreamObserver, SubscribeFn, Subscription } from './types';

export class StreamClosedError extends Error {
  constructor(message = 'Stream completed before emitting a value') {
    super(message);
    this.name = 'StreamClosedError';
  }
}

/**
 * A lazy, multicast-friendly view over a source of values.
 *
 * Nothing happens until `subscribe` is called; every subscriber attaches
 * independently to the underlying source. Errors do not terminate a
 * subscription, only `complete` does.
 */
export class CacheStream<V> {
  constructor(private readonly source: SubscribeFn<V>) {}

  subscribe(observerOrNext?: PartialObserver<V> | ((value: V) => void)): Subscription {
    const partial: PartialObserver<V> =
      typeof observerOrNext === 'function' ? { next: observerOrNext } : (observerOrNext ?? {});

    let closed = false;
    let detach: (() => void) | undefined;

    const close = (): void => {
      if (closed) return;
      closed = true;
      detach?.();
      detach = undefined;
    };

    const observer: StreamObserver<V> = {
      next: (value) => {
        if (closed) return;
        partial.next?.(value);
      },
      error: (err) => {
        if (closed) return;
        if (partial.error) {
          partial.error(err);
        } else {
          logger.error(`Unhandled cache stream error: ${logger.describeError(err)}`);
        }
      },
      complete: () => {
        if (closed) return;
        close();
        partial.complete?.();
      },
    };

    const teardown = this.source(observer);
    if (closed) {
      // The source completed while we were attaching
      teardown();
    } else {
      detach = teardown;
    }

    return {
      get closed() {
        return closed;
      },
      unsubscribe: close,
    };
  }

  map<R>(project: (value: V) => R): CacheStream<R> {
    return new CacheStream<R>((observer) =>
      this.source({
        next: (value) => {
          let projected: R;
          try {
            projected = project(value);
          } catch (err) {
            observer.error(err);
            return;
          }
          observer.next(projected);
        },
        error: (err) => observer.error(err),
        complete: () => observer.complete(),
      })
    );
  }

  filter(predicate: (value: V) => boolean): CacheStream<V> {
    return new CacheStream<V>((observer) =>
      this.source({
        next: (value) => {
          let keep: boolean;
          try {
            keep = predicate(value);
          } catch (err) {
            observer.error(err);
            return;
          }
          if (keep) {
            observer.next(value);
          }
        },
        error: (err) => observer.error(err),
        complete: () => observer.complete(),
      })
    );
  }

  /** Resolves with the next emitted value, rejects with the next error. */
  first(): Promise<V> {
    return new Promise<V>((resolve, reject) => {
      let settled = false;
      let subscription: Subscription | undefined;

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        subscription?.unsubscribe();
        return true;
      };

      subscription = this.subscribe({
        next: (value) => {
          if (settle()) resolve(value);
        },
        error: (err) => {
          if (settle()) reject(err);
        },
        complete: () => {
          if (settle()) reject(new StreamClosedError());
        },
      });

      if (settled) {
        subscription.unsubscribe();
      }
    });
  }
}
