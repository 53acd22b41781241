/**
 * Shared fixtures and stream probes for the cache tests
 */

import type { CacheStream, Subscription } from '../stream';

export interface Todo {
  id: string;
  text: string;
  listId?: string;
}

export const todoId = (todo: Todo): string => todo.id;

export const todo = (id: string, text: string, listId?: string): Todo =>
  listId === undefined ? { id, text } : { id, text, listId };

export interface StreamProbe<V> {
  values: V[];
  errors: unknown[];
  completed: boolean;
  subscription: Subscription;
}

export function probe<V>(stream: CacheStream<V>): StreamProbe<V> {
  const result: Omit<StreamProbe<V>, 'subscription'> = {
    values: [],
    errors: [],
    completed: false,
  };
  const subscription = stream.subscribe({
    next: (value) => result.values.push(value),
    error: (err) => result.errors.push(err),
    complete: () => {
      result.completed = true;
    },
  });
  return Object.assign(result, { subscription });
}

/** Lets every queued microtask and promise callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function deferred<V>(): {
  promise: Promise<V>;
  resolve: (value: V) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: V) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<V>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
