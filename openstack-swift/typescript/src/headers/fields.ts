/**
 * Typed accessors for individual Swift headers
 * @module openstack-swift-client/headers/fields
 */

import { MalformedHeaderError, ValidationError } from '../errors/index.js';
import type { HeaderMap } from './header-map.js';

/**
 * A typed view of one header inside a {@link HeaderMap}.
 *
 * Absent headers read as the field's empty value. Fields whose value cannot
 * be decoded throw {@link MalformedHeaderError} from `get()` and `validate()`.
 */
export abstract class Field<T> {
  constructor(
    protected readonly raw: HeaderMap,
    readonly key: string
  ) {}

  abstract get(): T;

  /**
   * Checks that the current value decodes
   *
   * @throws {MalformedHeaderError} If it does not
   */
  validate(): void {
    this.get();
  }

  exists(): boolean {
    return this.raw.has(this.key);
  }

  /**
   * Sets the header to the empty string. When written to the server this
   * removes the value there.
   */
  clear(): void {
    this.raw.set(this.key, '');
  }

  /**
   * Drops the header from the map, so that nothing is sent for it.
   */
  del(): void {
    this.raw.delete(this.key);
  }

  protected rawValue(): string {
    return this.raw.get(this.key) ?? '';
  }
}

export class StringField extends Field<string> {
  get(): string {
    return this.rawValue();
  }

  set(value: string): void {
    this.raw.set(this.key, value);
  }
}

/**
 * ETag header. Surrounding quotes sent by some proxies are stripped on read.
 */
export class EtagField extends StringField {
  override get(): string {
    return super.get().replace(/^"|"$/g, '');
  }
}

/**
 * Non-negative integer header (byte counts, object counts, quotas)
 */
export class UintField extends Field<number> {
  get(): number {
    const value = this.rawValue();
    if (value === '') {
      return 0;
    }
    if (!/^\d+$/.test(value)) {
      throw new MalformedHeaderError(this.key, `invalid unsigned integer "${value}"`);
    }
    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed)) {
      throw new MalformedHeaderError(this.key, `value out of range "${value}"`);
    }
    return parsed;
  }

  set(value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw ValidationError.invalidArgument(this.key, `must be a non-negative integer, got ${value}`);
    }
    this.raw.set(this.key, String(value));
  }
}

/**
 * "true"/"false" header, as used by X-Static-Large-Object
 */
export class BoolField extends Field<boolean> {
  get(): boolean {
    return ['true', '1', 'yes', 'on', 't', 'y'].includes(this.rawValue().toLowerCase());
  }

  set(value: boolean): void {
    this.raw.set(this.key, value ? 'True' : 'False');
  }
}

/**
 * RFC 1123 date header, such as Last-Modified
 */
export class HttpTimestampField extends Field<Date | undefined> {
  get(): Date | undefined {
    const value = this.rawValue();
    if (value === '') {
      return undefined;
    }
    const timestamp = Date.parse(value);
    if (Number.isNaN(timestamp)) {
      throw new MalformedHeaderError(this.key, `invalid HTTP date "${value}"`);
    }
    return new Date(timestamp);
  }

  set(value: Date): void {
    this.raw.set(this.key, value.toUTCString());
  }
}

/**
 * UNIX timestamp header in (possibly fractional) seconds, such as
 * X-Timestamp or X-Delete-At
 */
export class UnixTimestampField extends Field<Date | undefined> {
  get(): Date | undefined {
    const value = this.rawValue();
    if (value === '') {
      return undefined;
    }
    if (!/^\d+(\.\d+)?$/.test(value)) {
      throw new MalformedHeaderError(this.key, `invalid UNIX timestamp "${value}"`);
    }
    return new Date(Math.round(Number(value) * 1000));
  }

  /**
   * Writes whole seconds; Swift rejects fractional X-Delete-At values.
   */
  set(value: Date): void {
    this.raw.set(this.key, String(Math.floor(value.getTime() / 1000)));
  }
}

/**
 * User metadata stored under a fixed header prefix, e.g. X-Object-Meta-.
 *
 * Keys are case-insensitive. The prefix is added on write and stripped on
 * read. Setting a key to '' (or calling `clear`) is kept as an explicit
 * deletion instruction.
 */
export class MetadataField {
  constructor(
    private readonly raw: HeaderMap,
    readonly prefix: string
  ) {}

  get(key: string): string {
    return this.raw.get(this.prefix + key) ?? '';
  }

  exists(key: string): boolean {
    return this.raw.has(this.prefix + key);
  }

  set(key: string, value: string): void {
    this.raw.set(this.prefix + key, value);
  }

  clear(key: string): void {
    this.raw.set(this.prefix + key, '');
  }

  del(key: string): void {
    this.raw.delete(this.prefix + key);
  }

  /**
   * Metadata keys in lower case, without the prefix
   */
  keys(): string[] {
    const prefix = this.prefix.toLowerCase();
    return this.raw
      .keys()
      .filter((name) => name.toLowerCase().startsWith(prefix))
      .map((name) => name.slice(prefix.length).toLowerCase());
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const key of this.keys()) {
      record[key] = this.get(key);
    }
    return record;
  }
}
