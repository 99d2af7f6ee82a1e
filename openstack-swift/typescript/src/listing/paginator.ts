/**
 * Marker-based pagination over Swift listings
 */

import type { z } from 'zod';
import { MalformedResponseError } from '../errors/index.js';
import { executeForBody, withOptions, type RequestContext, type RequestOptions } from '../request/index.js';

/**
 * Options shared by container and object listings
 */
export interface ListOptions {
  /** Only list names starting with this prefix */
  prefix?: string;
  /** Entries per request; the server default (usually 10000) if unset */
  limit?: number;
  /** Start after this name */
  marker?: string;
  /** Stop before this name */
  endMarker?: string;
  /** Options passed to every page request */
  request?: RequestOptions;
}

const decoder = new TextDecoder();

/**
 * Walks a listing page by page.
 *
 * Each page starts after the last name of the previous one. Iteration ends on
 * an empty page (or a 204), or on a page shorter than `limit`.
 */
export abstract class ListingIterator<T> implements AsyncIterable<T> {
  private marker: string | undefined;
  private done = false;

  protected constructor(protected readonly options: ListOptions) {
    this.marker = options.marker;
  }

  /**
   * Fetches the next page. Resolves to an empty array once the listing is
   * exhausted.
   */
  async nextPage(): Promise<T[]> {
    if (this.done) {
      return [];
    }

    const page = await this.fetchPage(this.buildQuery());
    if (page.length === 0) {
      this.done = true;
      return [];
    }

    const last = page[page.length - 1];
    if (last !== undefined) {
      this.marker = this.markerOf(last);
    }
    if (this.options.limit !== undefined && page.length < this.options.limit) {
      this.done = true;
    }
    return page;
  }

  /**
   * Fetches all remaining pages
   */
  async collectDetailed(): Promise<T[]> {
    const result: T[] = [];
    for (;;) {
      const page = await this.nextPage();
      if (page.length === 0) {
        return result;
      }
      result.push(...page);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const page = await this.nextPage();
      if (page.length === 0) {
        return;
      }
      yield* page;
    }
  }

  protected abstract fetchPage(query: Record<string, string | undefined>): Promise<T[]>;

  protected abstract markerOf(entry: T): string;

  protected buildQuery(): Record<string, string | undefined> {
    return {
      format: 'json',
      prefix: this.options.prefix,
      limit: this.options.limit === undefined ? undefined : String(this.options.limit),
      marker: this.marker,
      end_marker: this.options.endMarker,
    };
  }
}

/**
 * GETs one listing page and validates it against `schema`
 *
 * @throws {MalformedResponseError} If the body is not a valid listing
 */
export async function fetchListing<S extends z.ZodTypeAny>(
  ctx: RequestContext,
  containerName: string | undefined,
  query: Record<string, string | undefined>,
  expectStatus: readonly number[],
  schema: S,
  opts: RequestOptions | undefined
): Promise<z.infer<S>> {
  const response = await executeForBody(
    ctx,
    withOptions({ method: 'GET', containerName, query, expectStatus, headers: { Accept: 'application/json' } }, opts)
  );
  const text = response.status === 204 ? '' : decoder.decode(response.body);
  if (text.trim() === '') {
    return schema.parse([]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError('listing', error instanceof Error ? error.message : String(error));
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new MalformedResponseError(
      'listing',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
    );
  }
  return result.data;
}
