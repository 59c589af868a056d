/**
 * A set whose membership is decided by a key derived from each item rather
 * than by reference. Adding an item whose key is already present replaces
 * the stored item in place.
 */
export class KeyedSet<T> implements Iterable<T> {
  private items = new Map<string, T>();

  constructor(private keyOf: (item: T) => string, initial: Iterable<T> = []) {
    for (const item of initial) this.add(item);
  }

  add(item: T): this {
    this.items.set(this.keyOf(item), item);
    return this;
  }

  has(key: string): boolean {
    return this.items.has(key);
  }

  get(key: string): T | undefined {
    return this.items.get(key);
  }

  get size(): number {
    return this.items.size;
  }

  values(): T[] {
    return Array.from(this.items.values());
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items.values();
  }
}
