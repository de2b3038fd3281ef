/**
 * Bounded LRU cache
 *
 * Map preserves insertion order, so the first key is always the least
 * recently used one. Reads re-insert the entry to mark it as fresh.
 */
export class BoundedCache<K, V> {
  private readonly entries = new Map<K, { value: V }>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Cache size must be a positive integer, got ${maxSize}`);
    }
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, { value });
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): { size: number; maxSize: number; hits: number; misses: number } {
    return { size: this.entries.size, maxSize: this.maxSize, hits: this.hits, misses: this.misses };
  }
}
