export class KeyNotFoundError<K> extends Error {
  constructor(public key: K) {
    super(`Key not found: ${String(key)}`);
  }
}

export class DuplicateScopeMemberError<K> extends Error {
  constructor(public key: K) {
    super(`Duplicate Scope Member: ${String(key)}`);
  }
}

/**
 * Persistent chain of bindings. `extend` returns a child scope that shadows
 * its parent; the parent itself is never modified, so a scope can be shared
 * between sibling branches of a tree walk.
 */
export class Scope<K, V> {
  private constructor(
    private readonly map: ReadonlyMap<K, V>,
    private readonly parent: Scope<K, V> | null
  ) {}
  static empty<K, V>(): Scope<K, V> {
    return new Scope<K, V>(new Map(), null);
  }
  static from<K, V>(entries: Iterable<[K, V]>): Scope<K, V> {
    const map = new Map<K, V>();
    for (const [key, value] of entries) {
      if (map.has(key)) throw new DuplicateScopeMemberError(key);
      map.set(key, value);
    }
    return new Scope(map, null);
  }
  has(key: K): boolean {
    if (this.map.has(key)) return true;
    if (this.parent) return this.parent.has(key);
    return false;
  }
  get(key: K): V {
    if (this.map.has(key)) return this.map.get(key) as V;
    if (this.parent) return this.parent.get(key);
    throw new KeyNotFoundError(key);
  }
  extend(key: K, value: V): Scope<K, V> {
    return new Scope(new Map([[key, value]]), this);
  }
  // visible bindings only; shadowed entries are skipped
  *[Symbol.iterator](): IterableIterator<[K, V]> {
    const seen = new Set<K>();
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    let current: Scope<K, V> | null = this;
    while (current) {
      for (const [key, value] of current.map) {
        if (seen.has(key)) continue;
        seen.add(key);
        yield [key, value];
      }
      current = current.parent;
    }
  }
}
