/**
 * Fetch-based HTTP transport implementation for the OpenStack Swift client
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { NetworkError, wrapError } from '../errors/index.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Token sent as X-Auth-Token with every request */
  authToken?: string;
  /** Time allowed until response headers arrive, in milliseconds */
  timeout: number;
  /** User-Agent header */
  userAgent?: string;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses the global Fetch API. Request bodies given as streams are sent with
 * chunked transfer encoding; response bodies are always handed back as
 * streams.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);
    const onCallerAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      if (request.signal?.aborted) {
        throw NetworkError.aborted();
      }

      const response = await fetch(request.url, this.buildInit(request, controller.signal));

      // The caller's signal must still reach a body that is being streamed.
      if (response.body === null) {
        request.signal?.removeEventListener('abort', onCallerAbort);
      }
      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body: response.body,
      };
    } catch (error) {
      request.signal?.removeEventListener('abort', onCallerAbort);
      throw this.handleError(error, request);
    } finally {
      // The timeout covers the response headers only
      clearTimeout(timeoutId);
    }
  }

  /**
   * Closes the transport (no-op for fetch-based transport)
   */
  async close(): Promise<void> {
    // Fetch API doesn't require explicit cleanup
  }

  private buildInit(request: HttpRequest, signal: AbortSignal): RequestInit {
    const headers: Record<string, string> = { ...request.headers };
    if (this.options.authToken) {
      headers['X-Auth-Token'] = this.options.authToken;
    }
    if (this.options.userAgent) {
      headers['User-Agent'] = this.options.userAgent;
    }

    const init: RequestInit = {
      method: request.method,
      headers,
      signal,
    };

    if (request.body instanceof Uint8Array) {
      init.body = request.body;
    } else if (request.body) {
      // streaming request bodies require half-duplex mode
      init.body = request.body;
      init.duplex = 'half';
    }

    return init;
  }

  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  private handleError(error: unknown, request: HttpRequest): Error {
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
      return request.signal?.aborted ? NetworkError.aborted() : NetworkError.timeout(this.options.timeout);
    }
    return wrapError(error);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(options: FetchTransportOptions): HttpTransport {
  return new FetchTransport(options);
}
