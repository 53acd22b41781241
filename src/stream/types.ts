export interface StreamObserver<V> {
  next(value: V): void;
  error(error: unknown): void;
  complete(): void;
}

export type PartialObserver<V> = Partial<StreamObserver<V>>;

export interface Subscription {
  readonly closed: boolean;
  unsubscribe(): void;
}

/**
 * Attaches a fully-populated observer to a source and returns the function
 * that detaches it again.
 */
export type SubscribeFn<V> = (observer: StreamObserver<V>) => () => void;
