/**
 * One cached value together with its identity and every composite key it is
 * currently indexed under.
 */
export class Cachable<T> {
  readonly createdAt: number;
  updatedAt: number;
  private readonly keys = new Set<string>();

  constructor(
    public model: T,
    readonly id: string,
    lastUpdate?: number
  ) {
    this.createdAt = Date.now();
    this.updatedAt = lastUpdate ?? this.createdAt;
  }

  get streamKeys(): string[] {
    return [...this.keys];
  }

  addStreamKeyIfNotExists(key: string): void {
    this.keys.add(key);
  }

  removeStreamKey(key: string): void {
    this.keys.delete(key);
  }

  update(model: T): void {
    this.model = model;
    this.updatedAt = Date.now();
  }
}
