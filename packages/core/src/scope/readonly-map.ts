/**
 * Read-only view over a Map. Only read operations exist on the view,
 * so holders of a snapshot cannot change it through the shared reference.
 */
export class ReadonlyMapView<K, V> implements ReadonlyMap<K, V> {
  private readonly inner: Map<K, V>;

  constructor(source: Iterable<readonly [K, V]>) {
    this.inner = new Map(source);
  }

  get size(): number {
    return this.inner.size;
  }

  get(key: K): V | undefined {
    return this.inner.get(key);
  }

  has(key: K): boolean {
    return this.inner.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void): void {
    this.inner.forEach((value, key) => callback(value, key, this));
  }

  entries() {
    return this.inner.entries();
  }

  keys() {
    return this.inner.keys();
  }

  values() {
    return this.inner.values();
  }

  [Symbol.iterator]() {
    return this.inner[Symbol.iterator]();
  }
}
