import type { CacheEngineConfig, CacheEngineConfigInput } from '../config/schema';
import { resolveEngineConfig } from '../config/validator';
import * as logger from '../logging';
import type { BroadcastChannel, CacheStream } from '../stream';
import { Cachable } from './cachable';
import { CacheConfigurationError } from './errors';
import { MemoryCacheBucket } from './memory-bucket';
import { SubscriptionRegistry } from './subscription-registry';
import type {
  BucketFactory,
  CacheBucket,
  CacheId,
  CacheNamespace,
  CacheStats,
  IdExtractor,
  ListFetcher,
  SingleFetcher,
} from './types';

function buildStreamKey(key: string, suffix: string | undefined, delimiter: string): string {
  return suffix === undefined ? key : `${key}${delimiter}${suffix}`;
}

function valuesOf<T>(entries: readonly Cachable<T>[]): T[] {
  return entries.map((entry) => entry.model);
}

export interface CacheEngineOptions<T> {
  bucketFactory?: BucketFactory<T>;
}

/**
 * Reactive cache for values of one type.
 *
 * Reads hand back a stream that first replays whatever is cached for the key,
 * then follows every write touching that key. Writes keep two views in sync:
 * the collection bucket (list keys plus each value's own id) and the single
 * bucket (one canonical entry per id).
 */
export class CacheEngine<T> {
  private readonly config: CacheEngineConfig;
  private readonly collection: CacheBucket<T>;
  private readonly single: CacheBucket<T>;
  private readonly registry = new SubscriptionRegistry<T[]>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly stats = {
    fetches: 0,
    fetchErrors: 0,
    emissions: 0,
  };

  constructor(config?: CacheEngineConfigInput, options?: CacheEngineOptions<T>) {
    this.config = resolveEngineConfig(config);
    const createBucket = options?.bucketFactory ?? (() => new MemoryCacheBucket<T>());
    this.collection = createBucket('collection');
    this.single = createBucket('single');
  }

  get disposed(): boolean {
    return this.registry.disposed;
  }

  getList(key: string, idExtractor?: IdExtractor<T>, fetcher?: ListFetcher<T>): CacheStream<T[]> {
    return this.watch(key, 'collection', idExtractor, fetcher).stream;
  }

  getSingle(id: CacheId, idExtractor?: IdExtractor<T>, fetcher?: SingleFetcher<T>): CacheStream<T> {
    let listFetcher: ListFetcher<T> | undefined;
    if (fetcher) {
      listFetcher = async () => {
        const model = await fetcher();
        return model === null || model === undefined ? [] : [model];
      };
    }

    return this.watch(String(id), 'single', idExtractor, listFetcher)
      .stream.filter((models) => models.length > 0)
      .map((models) => models[0]);
  }

  putSingle(value: T, id: CacheId): void {
    this.putList(String(id), [value], () => id);
  }

  putList(key: string, values: readonly T[], idExtractor: IdExtractor<T>): void {
    const isSingleWrite = values.length === 1 && String(idExtractor(values[0])) === key;

    const collectionKeys = this.writeCollection(key, values, idExtractor);
    const singleKeys = this.writeSingles(values, idExtractor, !isSingleWrite);

    logger.debug(
      `Cached ${values.length} value(s) under '${key}' (${collectionKeys.size + singleKeys.size} key(s) touched)`
    );

    this.notify(this.collection, collectionKeys);
    this.notify(this.single, singleKeys);
  }

  /** Resolves once every fetch started so far has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  getStats(): CacheStats {
    return {
      channels: this.registry.size,
      fetches: this.stats.fetches,
      fetchErrors: this.stats.fetchErrors,
      emissions: this.stats.emissions,
      inFlight: this.inFlight.size,
    };
  }

  dispose(): void {
    if (this.registry.disposed) {
      return;
    }
    this.registry.closeAll();
    logger.debug('Cache engine disposed');
  }

  private watch(
    key: string,
    namespace: CacheNamespace,
    idExtractor: IdExtractor<T> | undefined,
    fetcher: ListFetcher<T> | undefined
  ): BroadcastChannel<T[]> {
    if (fetcher && !idExtractor) {
      throw new CacheConfigurationError(
        `An id extractor is required to cache fetched values for '${key}'`
      );
    }

    const bucket = this.bucketFor(namespace);
    const streamKey = this.streamKey(key, namespace);
    const channel = this.registry.resolve(streamKey);

    // TODO: skip the fetch when the cached entries are fresh enough once entries carry a TTL
    if (bucket.allForKey(streamKey).length > 0) {
      // Deferred so that a subscriber attaching right after this call sees it
      queueMicrotask(() => this.emitSnapshot(channel, bucket, streamKey));
    }

    if (fetcher && idExtractor) {
      this.track(this.refresh(key, channel, idExtractor, fetcher));
    }

    return channel;
  }

  private async refresh(
    key: string,
    channel: BroadcastChannel<T[]>,
    idExtractor: IdExtractor<T>,
    fetcher: ListFetcher<T>
  ): Promise<void> {
    try {
      this.stats.fetches += 1;
      logger.debug(`Refreshing '${channel.key}'`);
      // A fetcher that throws synchronously fails through the channel too
      const models = await Promise.resolve().then(fetcher);
      if (!models || models.length === 0) {
        logger.debug(`Refresh of '${channel.key}' returned nothing, keeping cached values`);
        return;
      }
      this.putList(key, models, idExtractor);
    } catch (err) {
      this.stats.fetchErrors += 1;
      const message = `Refresh of '${channel.key}' failed: ${logger.describeError(err)}`;
      if (this.config.logFetchErrors) {
        logger.warning(message);
      } else {
        logger.debug(message);
      }
      channel.addError(err);
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.then(() => {
      this.inFlight.delete(task);
    });
  }

  private emitSnapshot(
    channel: BroadcastChannel<T[]>,
    bucket: CacheBucket<T>,
    streamKey: string
  ): void {
    const entries = bucket.allForKey(streamKey);
    if (entries.length === 0) {
      return;
    }
    if (channel.add(valuesOf(entries))) {
      this.stats.emissions += 1;
      logger.debug(`Replayed ${entries.length} cached value(s) on '${streamKey}'`);
    }
  }

  private writeCollection(
    key: string,
    values: readonly T[],
    idExtractor: IdExtractor<T>
  ): Set<string> {
    const listKey = this.streamKey(key, 'collection');
    this.collection.removeKeyFromValues(listKey);

    const touched = new Set<string>([listKey]);
    for (const value of values) {
      const id = String(idExtractor(value));
      const entry = new Cachable(value, id);
      for (const streamKey of this.collection.put(this.streamKey(id, 'collection'), entry)) {
        touched.add(streamKey);
      }
      for (const streamKey of this.collection.put(listKey, entry)) {
        touched.add(streamKey);
      }
    }
    return touched;
  }

  private writeSingles(
    values: readonly T[],
    idExtractor: IdExtractor<T>,
    insertWhenMissing: boolean
  ): Set<string> {
    const touched = new Set<string>();
    for (const value of values) {
      const id = String(idExtractor(value));
      const streamKey = this.streamKey(id, 'single');

      // A batch never replaces a single-item value that is already cached
      if (insertWhenMissing && this.single.allForKey(streamKey).length > 0) {
        continue;
      }

      for (const touchedKey of this.single.put(streamKey, new Cachable(value, id))) {
        touched.add(touchedKey);
      }
    }
    return touched;
  }

  private notify(bucket: CacheBucket<T>, streamKeys: Set<string>): void {
    if (this.registry.disposed) {
      return;
    }

    for (const streamKey of streamKeys) {
      const channel = this.registry.resolve(streamKey);
      if (channel.add(valuesOf(bucket.allForKey(streamKey)))) {
        this.stats.emissions += 1;
      }
    }
  }

  private bucketFor(namespace: CacheNamespace): CacheBucket<T> {
    return namespace === 'single' ? this.single : this.collection;
  }

  private streamKey(key: string, namespace: CacheNamespace): string {
    const suffix = namespace === 'single' ? this.config.singleSuffix : undefined;
    return buildStreamKey(key, suffix, this.config.keyDelimiter);
  }
}
