/**
 * Bounded buffers with oldest-first eviction.
 *
 * One implementation serves both modes a span needs:
 * - keyed (`EvictingMap`): setting an existing key replaces its value and
 *   makes it the newest entry; a new key beyond capacity evicts the oldest.
 * - FIFO (`EvictingQueue`): every push is a new entry; beyond capacity the
 *   oldest is evicted.
 *
 * Both rely on `Map` iterating in insertion order.
 */

export class EvictingMap<K, V> {
  private readonly entries = new Map<K, V>();
  private dropped = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Entries evicted or rejected since construction */
  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Insert or update `key`. Returns false when capacity is zero and the
   * entry could not be kept.
   */
  set(key: K, value: V): boolean {
    if (this.entries.has(key)) {
      // Re-insert so the updated key becomes the newest.
      this.entries.delete(key);
      this.entries.set(key, value);
      return true;
    }
    if (this.capacity === 0) {
      this.dropped++;
      return false;
    }
    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
        this.dropped++;
      }
    }
    this.entries.set(key, value);
    return true;
  }

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  keys(): IterableIterator<K> {
    return this.entries.keys();
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries.entries();
  }

  /**
   * Copy of the current entries, oldest first.
   */
  toMap(): Map<K, V> {
    return new Map(this.entries);
  }

  /**
   * Unmodifiable copy of the current entries, oldest first.
   */
  toFrozenMap(): ReadonlyMap<K, V> {
    return new FrozenMap(this.entries);
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * FIFO buffer built on `EvictingMap` with a monotonically increasing key,
 * so a push never collides with a retained entry.
 */
export class EvictingQueue<T> {
  private readonly map: EvictingMap<number, T>;
  private sequence = 0;

  constructor(capacity: number) {
    this.map = new EvictingMap<number, T>(capacity);
  }

  get capacity(): number {
    return this.map.capacity;
  }

  get size(): number {
    return this.map.size;
  }

  get droppedCount(): number {
    return this.map.droppedCount;
  }

  push(value: T): boolean {
    return this.map.set(this.sequence++, value);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.map.values();
  }

  /**
   * Copy of the retained entries, oldest first.
   */
  toArray(): T[] {
    return Array.from(this.map.values());
  }

  /**
   * Removes and returns every retained entry, oldest first.
   */
  drain(): T[] {
    const items = this.toArray();
    this.map.clear();
    return items;
  }
}

/**
 * A `Map` whose contents are fixed at construction. `set`, `delete` and
 * `clear` throw, as writes to a frozen object do in strict mode.
 */
export class FrozenMap<K, V> extends Map<K, V> {
  constructor(entries: Iterable<readonly [K, V]> = []) {
    super();
    for (const [key, value] of entries) {
      super.set(key, value);
    }
    Object.freeze(this);
  }

  override set(key: K, _value: V): this {
    throw new TypeError(`Cannot set ${String(key)}: map is frozen`);
  }

  override delete(key: K): boolean {
    throw new TypeError(`Cannot delete ${String(key)}: map is frozen`);
  }

  override clear(): void {
    throw new TypeError('Cannot clear: map is frozen');
  }
}
