/**
 * Case-insensitive raw header storage
 * @module openstack-swift-client/headers/header-map
 */

interface HeaderEntry {
  name: string;
  value: string;
}

/**
 * A case-insensitive mapping of header names to values.
 *
 * Lookups ignore case; iteration yields each header under the spelling it
 * was last set with.
 */
export class HeaderMap implements Iterable<[string, string]> {
  private readonly entries = new Map<string, HeaderEntry>();

  constructor(init?: Iterable<readonly [string, string]> | Record<string, string>) {
    if (init === undefined) {
      return;
    }
    const pairs = isIterable(init) ? init : Object.entries(init);
    for (const [name, value] of pairs) {
      this.set(name, value);
    }
  }

  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase())?.value;
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  set(name: string, value: string): this {
    this.entries.set(name.toLowerCase(), { name, value });
    return this;
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Header names under their stored spelling
   */
  keys(): string[] {
    return Array.from(this.entries.values(), (entry) => entry.name);
  }

  *[Symbol.iterator](): IterableIterator<[string, string]> {
    for (const entry of this.entries.values()) {
      yield [entry.name, entry.value];
    }
  }

  /**
   * Copies all entries of `other` into this map, overwriting existing ones.
   */
  merge(other: Iterable<readonly [string, string]> | Record<string, string>): this {
    const pairs = isIterable(other) ? other : Object.entries(other);
    for (const [name, value] of pairs) {
      this.set(name, value);
    }
    return this;
  }

  clone(): HeaderMap {
    return new HeaderMap(this);
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, value] of this) {
      record[name] = value;
    }
    return record;
  }
}

function isIterable(
  value: Iterable<readonly [string, string]> | Record<string, string>
): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
