export class CacheConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CacheConfigurationError';
  }
}

export class CacheDisposedError extends Error {
  public readonly key: string;

  constructor(key: string) {
    super(`Cannot subscribe to '${key}': the cache engine has been disposed`);
    this.name = 'CacheDisposedError';
    this.key = key;
  }
}
