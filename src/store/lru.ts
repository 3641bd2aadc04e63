export interface LruOptions<V> {
  maxEntries: number;
  /** Optional second budget, e.g. atoms held; entries heavier than the budget are not kept. */
  maxWeight?: number;
  weigh?: (value: V) => number;
  onEvict?: (key: string, value: V) => void;
}

/** Least-recently-used map bounded by entry count and, optionally, total weight. */
export class LruCache<V> {
  private readonly map = new Map<string, { value: V; weight: number }>();
  private totalWeight = 0;

  constructor(private readonly options: LruOptions<V>) {
    if (options.maxEntries < 1) throw new RangeError("maxEntries must be >= 1");
  }

  get size(): number {
    return this.map.size;
  }

  get weight(): number {
    return this.totalWeight;
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  get(key: string): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    // Re-insert to mark as most recently used
    this.map.delete(key);
    this.map.set(key, entry);
    return entry.value;
  }

  set(key: string, value: V): void {
    const weight = this.options.weigh ? this.options.weigh(value) : 0;
    const existing = this.map.get(key);
    if (existing) {
      this.map.delete(key);
      this.totalWeight -= existing.weight;
    }
    const { maxWeight } = this.options;
    if (maxWeight != null && weight > maxWeight) return;
    this.map.set(key, { value, weight });
    this.totalWeight += weight;
    this.evict();
  }

  delete(key: string): boolean {
    const entry = this.map.get(key);
    if (!entry) return false;
    this.map.delete(key);
    this.totalWeight -= entry.weight;
    return true;
  }

  clear(): void {
    this.map.clear();
    this.totalWeight = 0;
  }

  /** Least recently used first. */
  keys(): string[] {
    return Array.from(this.map.keys());
  }

  private evict(): void {
    const { maxEntries, maxWeight } = this.options;
    while (this.map.size > maxEntries || (maxWeight != null && this.totalWeight > maxWeight)) {
      const oldest = this.map.keys().next();
      if (oldest.done) return;
      const entry = this.map.get(oldest.value);
      this.map.delete(oldest.value);
      if (entry) {
        this.totalWeight -= entry.weight;
        this.options.onEvict?.(oldest.value, entry.value);
      }
    }
  }
}
