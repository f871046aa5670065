/**
 * Bounded LRU map. Relies on Map preserving insertion order: the first key
 * is always the least recently used one.
 */

export class LRUCache<K, V> {
  private readonly cache = new Map<K, V>();
  private readonly maxSize: number;

  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error('LRU cache maxSize must be a positive integer');
    }
    this.maxSize = maxSize;
  }

  /**
   * Read a value and mark it as most recently used
   */
  get(key: K): V | undefined {
    if (!this.cache.has(key)) {
      return undefined;
    }
    const value = this.cache.get(key);
    this.cache.delete(key);
    if (value !== undefined) {
      this.cache.set(key, value);
    }
    return value;
  }

  /**
   * Read a value without touching its recency
   */
  peek(key: K): V | undefined {
    return this.cache.get(key);
  }

  /**
   * Insert or refresh a value, evicting the oldest entry when full.
   * Returns the evicted key, if any.
   */
  set(key: K, value: V): K | undefined {
    let evicted: K | undefined;
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        evicted = oldest.value;
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, value);
    return evicted;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  /** Keys from least to most recently used */
  keys(): K[] {
    return Array.from(this.cache.keys());
  }

  /** Values from least to most recently used */
  values(): V[] {
    return Array.from(this.cache.values());
  }
}
