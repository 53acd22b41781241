import type { Cachable } from './cachable';

export type CacheId = string | number | bigint;

/** Must be pure and total over every value ever stored for the type. */
export type IdExtractor<T> = (value: T) => CacheId;

export type ListFetcher<T> = () => Promise<readonly T[] | null | undefined>;

export type SingleFetcher<T> = () => Promise<T | null | undefined>;

/**
 * `collection` holds values under arbitrary list keys plus their own ids,
 * `single` holds one canonical entry per id.
 */
export type CacheNamespace = 'collection' | 'single';

export interface CacheBucket<T> {
  /** Indexes `entry` under `streamKey` and returns every key the stored entry is now reachable under. */
  put(streamKey: string, entry: Cachable<T>): string[];
  allForKey(streamKey: string): Cachable<T>[];
  /** Detaches all entries currently indexed under `streamKey`. */
  removeKeyFromValues(streamKey: string): void;
}

export type BucketFactory<T> = (namespace: CacheNamespace) => CacheBucket<T>;

export interface CacheStats {
  channels: number;
  fetches: number;
  fetchErrors: number;
  emissions: number;
  inFlight: number;
}
