export { Cachable } from './cachable';
export { CacheEngine } from './cache-engine';
export type { CacheEngineOptions } from './cache-engine';
export { CacheConfigurationError, CacheDisposedError } from './errors';
export { MemoryCacheBucket } from './memory-bucket';
export { SubscriptionRegistry } from './subscription-registry';
export type {
  BucketFactory,
  CacheBucket,
  CacheId,
  CacheNamespace,
  CacheStats,
  IdExtractor,
  ListFetcher,
  SingleFetcher,
} from './types';
