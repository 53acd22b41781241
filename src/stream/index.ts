export { BroadcastChannel } from './broadcast-channel';
export { CacheStream, StreamClosedError } from './cache-stream';
export type { PartialObserver, StreamObserver, SubscribeFn, Subscription } from './types';
