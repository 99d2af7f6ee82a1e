/**
 * Transport that answers from a queue of canned responses
 * @module openstack-swift-client/simulation/stub-transport
 */

import { NetworkError } from '../errors/index.js';
import { HeaderMap } from '../headers/index.js';
import { bytesToStream, readStream } from '../transport/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';
import type { CannedResponse, RecordedRequest } from './types.js';

const encoder = new TextEncoder();

/**
 * Replays responses in the order they were queued and records every request.
 *
 * Suited to tests of response handling (odd status codes, malformed bodies)
 * that the {@link SwiftSimulator} would never produce.
 *
 * @example
 * ```typescript
 * const transport = new StubTransport([{ status: 503, body: 'try later' }]);
 * const account = new Account({ storageUrl: 'http://swift.test/v1/AUTH_test', transport });
 * await expect(account.headers()).rejects.toThrow('got 503 instead');
 * ```
 */
export class StubTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly queue: CannedResponse[];

  constructor(responses: readonly CannedResponse[] = []) {
    this.queue = [...responses];
  }

  enqueue(...responses: CannedResponse[]): this {
    this.queue.push(...responses);
    return this;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * @throws {NetworkError} When no response is left
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const body =
      request.body === undefined
        ? new Uint8Array(0)
        : request.body instanceof Uint8Array
          ? request.body
          : await readStream(request.body);
    this.requests.push({ method: request.method, url: request.url, headers: new HeaderMap(request.headers), body });

    const response = this.queue.shift();
    if (response === undefined) {
      throw new NetworkError({
        message: `No canned response left for ${request.method} ${request.url}`,
        code: 'NO_RECORDING',
        isRetryable: false,
        details: { method: request.method, url: request.url },
      });
    }

    const bytes = typeof response.body === 'string' ? encoder.encode(response.body) : response.body;
    return {
      status: response.status,
      headers: { ...response.headers },
      body: bytes === undefined || bytes.length === 0 ? null : bytesToStream(bytes),
    };
  }

  async close(): Promise<void> {
    this.queue.length = 0;
  }
}
