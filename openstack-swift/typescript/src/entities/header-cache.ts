/**
 * Lazily loaded, explicitly invalidated header snapshot of one entity
 */

import { isStatusCode } from '../errors/index.js';
import type { SwiftHeaders } from '../headers/index.js';
import type { RequestOptions } from '../request/index.js';

/**
 * Fetch-once cache for the headers of a single account, container or object.
 *
 * The snapshot is loaded on first use and kept until `invalidate()` is
 * called. It never expires on its own. Callers receive copies, so editing
 * returned headers leaves the snapshot as the server sent it. Not safe for
 * concurrent mutation; give each concurrent caller its own entity handle.
 */
export class HeaderCache<H extends SwiftHeaders> {
  private snapshot: H | undefined;

  constructor(
    private readonly load: (opts?: RequestOptions) => Promise<H>,
    private readonly copy: (headers: H) => H
  ) {}

  /**
   * Returns a copy of the cached snapshot, fetching it first if there is none
   *
   * @throws {UnexpectedStatusCodeError} If the entity could not be fetched
   * @throws {MalformedHeaderError} If the response headers do not decode
   */
  async get(opts?: RequestOptions): Promise<H> {
    if (this.snapshot !== undefined) {
      return this.copy(this.snapshot);
    }
    const headers = await this.load(opts);
    headers.validate();
    this.snapshot = headers;
    return this.copy(headers);
  }

  /**
   * The snapshot as loaded, without fetching. Must not be modified.
   */
  peek(): H | undefined {
    return this.snapshot;
  }

  /**
   * Like `get()`, but answers false instead of throwing for a 404
   */
  async exists(opts?: RequestOptions): Promise<boolean> {
    try {
      await this.get(opts);
      return true;
    } catch (error) {
      if (isStatusCode(error, 404)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Replaces the snapshot with headers obtained elsewhere (e.g. from a GET)
   */
  store(headers: H): void {
    headers.validate();
    this.snapshot = headers;
  }

  invalidate(): void {
    this.snapshot = undefined;
  }
}
