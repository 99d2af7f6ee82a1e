/**
 * MD5 digests of upload bodies
 */

import { md5 } from '@noble/hashes/legacy';
import { bytesToHex } from '@noble/hashes/utils';

/**
 * Hex MD5 digest of a byte array
 */
export function md5Hex(data: Uint8Array): string {
  return bytesToHex(md5(data));
}

/**
 * Hashes a stream as it flows past.
 *
 * `digest()` is only meaningful once the tapped stream has been read to its
 * end, and may be called once.
 */
export class Md5Tap {
  private readonly hasher = md5.create();
  private byteCount = 0;

  /**
   * Returns `source` piped through the hasher
   */
  tap(source: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
    const transform = new TransformStream<Uint8Array, Uint8Array>({
      transform: (chunk, controller) => {
        this.hasher.update(chunk);
        this.byteCount += chunk.length;
        controller.enqueue(chunk);
      },
    });
    return source.pipeThrough(transform);
  }

  get bytesHashed(): number {
    return this.byteCount;
  }

  digest(): string {
    return bytesToHex(this.hasher.digest());
  }
}
