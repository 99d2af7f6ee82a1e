/**
 * Lazily issued object download
 */

import type { SwiftObject } from '../entities/index.js';
import { UsageError } from '../errors/index.js';
import { ObjectHeaders } from '../headers/index.js';
import {
  EXPECTED_STATUS,
  executeRequest,
  withOptions,
  type RequestOptions,
  type SwiftResponse,
} from '../request/index.js';
import { discardBody, readStream } from '../transport/index.js';

const decoder = new TextDecoder();

/**
 * Result of {@link SwiftObject.download}.
 *
 * The GET request is sent by the first of `asStream()`, `asBytes()` or
 * `asString()`. Exactly one of them may be called; the content cannot be
 * read twice.
 */
export class DownloadedObject {
  private consumed = false;

  constructor(
    private readonly object: SwiftObject,
    private readonly opts?: RequestOptions
  ) {}

  /**
   * Returns the response body as it arrives. The caller must read it to
   * its end or cancel it.
   */
  async asStream(): Promise<ReadableStream<Uint8Array>> {
    const response = await this.open();
    return response.body ?? emptyStream();
  }

  async asBytes(): Promise<Uint8Array> {
    const response = await this.open();
    return response.body === null ? new Uint8Array(0) : readStream(response.body);
  }

  /**
   * Decodes the content as UTF-8
   */
  async asString(): Promise<string> {
    return decoder.decode(await this.asBytes());
  }

  private async open(): Promise<SwiftResponse> {
    if (this.consumed) {
      throw UsageError.downloadAlreadyConsumed(this.object.fullName);
    }
    this.consumed = true;

    const ranged = this.isRanged();
    const response = await executeRequest(
      this.object.account,
      withOptions(
        {
          method: 'GET',
          containerName: this.object.container.name,
          objectName: this.object.name,
          expectStatus: ranged ? EXPECTED_STATUS.object.rangedDownload : EXPECTED_STATUS.object.download,
        },
        this.opts
      )
    );

    if (!ranged) {
      try {
        this.object.storeHeaders(new ObjectHeaders(response.headers));
      } catch (error) {
        await discardBody(response.body);
        throw error;
      }
    }
    return response;
  }

  private isRanged(): boolean {
    const headers = this.opts?.headers ?? {};
    return Object.keys(headers).some((name) => name.toLowerCase() === 'range');
  }
}

function emptyStream(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.close();
    },
  });
}
