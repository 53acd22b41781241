import type { Cachable } from './cachable';
import type { CacheBucket } from './types';

export class MemoryCacheBucket<T> implements CacheBucket<T> {
  private readonly entries = new Map<string, Cachable<T>>();
  // composite key -> ids, in insertion order
  private readonly index = new Map<string, string[]>();

  put(streamKey: string, entry: Cachable<T>): string[] {
    let stored = this.entries.get(entry.id);
    if (stored) {
      if (stored !== entry) {
        stored.update(entry.model);
      }
    } else {
      stored = entry;
      this.entries.set(entry.id, entry);
    }

    const ids = this.index.get(streamKey);
    if (!ids) {
      this.index.set(streamKey, [stored.id]);
    } else if (!ids.includes(stored.id)) {
      ids.push(stored.id);
    }
    stored.addStreamKeyIfNotExists(streamKey);

    return stored.streamKeys;
  }

  allForKey(streamKey: string): Cachable<T>[] {
    const ids = this.index.get(streamKey) ?? [];
    const result: Cachable<T>[] = [];
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) {
        result.push(entry);
      }
    }
    return result;
  }

  removeKeyFromValues(streamKey: string): void {
    const ids = this.index.get(streamKey);
    if (!ids) {
      return;
    }
    this.index.delete(streamKey);

    for (const id of ids) {
      const entry = this.entries.get(id);
      if (!entry) {
        continue;
      }
      entry.removeStreamKey(streamKey);
      if (entry.streamKeys.length === 0) {
        this.entries.delete(id);
      }
    }
  }

  keys(): string[] {
    return [...this.index.keys()];
  }

  size(): number {
    return this.entries.size;
  }
}
