import * as logger from '../logging';
import { BroadcastChannel } from '../stream';
import { CacheDisposedError } from './errors';

/**
 * Composite key -> broadcast channel. Channels are created on first access
 * and live until `closeAll`.
 */
export class SubscriptionRegistry<V> {
  private readonly channels = new Map<string, BroadcastChannel<V>>();
  private isDisposed = false;

  get disposed(): boolean {
    return this.isDisposed;
  }

  get size(): number {
    return this.channels.size;
  }

  resolve(key: string): BroadcastChannel<V> {
    if (this.isDisposed) {
      throw new CacheDisposedError(key);
    }

    let channel = this.channels.get(key);
    if (!channel) {
      channel = new BroadcastChannel<V>(key);
      this.channels.set(key, channel);
      logger.debug(`Created channel '${key}'`);
    }
    return channel;
  }

  closeAll(): void {
    if (this.isDisposed) {
      return;
    }
    this.isDisposed = true;

    for (const channel of this.channels.values()) {
      channel.close();
    }
    logger.debug(`Closed ${this.channels.size} channel(s)`);
  }
}
