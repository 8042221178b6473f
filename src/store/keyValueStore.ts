/**
 * Process-wide keyed state (routing records, watch channels, task
 * completions) sits behind this interface so a durable backend can replace
 * the in-memory one without touching callers.
 */
export interface KeyValueStore<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Returns true when the value was written, false when the key was taken. */
  createIfAbsent(key: string, value: V): Promise<boolean>;
  /**
   * Writes `next` only if the stored value still satisfies `expected`.
   * Returns false when it did not (including when the key is absent).
   */
  compareAndSet(key: string, expected: (current: V) => boolean, next: V): Promise<boolean>;
  entries(): Promise<Array<[string, V]>>;
}

export class InMemoryKeyValueStore<V> implements KeyValueStore<V> {
  private readonly map = new Map<string, V>();

  async get(key: string): Promise<V | undefined> {
    return this.map.get(key);
  }

  async set(key: string, value: V): Promise<void> {
    this.map.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.map.delete(key);
  }

  // Each method body runs without awaiting, so check and write cannot interleave.
  async createIfAbsent(key: string, value: V): Promise<boolean> {
    if (this.map.has(key)) return false;
    this.map.set(key, value);
    return true;
  }

  async compareAndSet(key: string, expected: (current: V) => boolean, next: V): Promise<boolean> {
    const current = this.map.get(key);
    if (current === undefined || !expected(current)) return false;
    this.map.set(key, next);
    return true;
  }

  async entries(): Promise<Array<[string, V]>> {
    return [...this.map.entries()];
  }
}
