import * as logger from '../logging';
import { CacheStream } from './cache-stream';
import type { StreamObserver } from './types';

/**
 * Multi-subscriber channel. Values are delivered synchronously to whoever is
 * listening at the time of the emission; there is no replay.
 */
export class BroadcastChannel<V> {
  readonly stream: CacheStream<V>;
  private readonly observers = new Set<StreamObserver<V>>();
  private isClosed = false;

  constructor(readonly key: string) {
    this.stream = new CacheStream<V>((observer) => this.listen(observer));
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get listenerCount(): number {
    return this.observers.size;
  }

  add(value: V): boolean {
    if (this.isClosed) return false;
    for (const observer of [...this.observers]) {
      this.deliver(() => observer.next(value));
    }
    return true;
  }

  addError(err: unknown): boolean {
    if (this.isClosed) return false;
    for (const observer of [...this.observers]) {
      this.deliver(() => observer.error(err));
    }
    return true;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const observers = [...this.observers];
    this.observers.clear();
    for (const observer of observers) {
      this.deliver(() => observer.complete());
    }
  }

  private listen(observer: StreamObserver<V>): () => void {
    if (this.isClosed) {
      observer.complete();
      return () => undefined;
    }

    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  // A throwing listener must not starve the ones registered after it
  private deliver(callback: () => void): void {
    try {
      callback();
    } catch (err) {
      logger.error(`Listener on '${this.key}' threw: ${logger.describeError(err)}`);
    }
  }
}
