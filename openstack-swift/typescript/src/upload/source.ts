/**
 * Upload sources and their conversion to request bodies
 */

import { iterableToStream } from '../transport/index.js';
import { Md5Tap, md5Hex } from './checksum.js';

/**
 * Content accepted by uploads. Node.js `Readable` streams are async
 * iterables of chunks and can be passed as they are.
 */
export type UploadSource = Uint8Array | string | ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>;

export interface PreparedBody {
  body: Uint8Array | ReadableStream<Uint8Array>;
  /**
   * Hex MD5 of the bytes sent. For streamed bodies, only valid after the
   * body was read to its end.
   */
  digest(): string;
}

const encoder = new TextEncoder();

/**
 * Turns an upload source into a request body whose digest can be taken
 * once it was sent. Byte arrays and strings are sent with a
 * Content-Length; everything else is streamed.
 */
export function prepareBody(source: UploadSource | undefined): PreparedBody {
  if (source === undefined) {
    return fixedBody(new Uint8Array(0));
  }
  if (typeof source === 'string') {
    return fixedBody(encoder.encode(source));
  }
  if (source instanceof Uint8Array) {
    return fixedBody(source);
  }

  const stream = source instanceof ReadableStream ? source : iterableToStream(source);
  const tap = new Md5Tap();
  const body = tap.tap(stream);
  let digest: string | undefined;
  return {
    body,
    digest: () => {
      digest ??= tap.digest();
      return digest;
    },
  };
}

function fixedBody(data: Uint8Array): PreparedBody {
  const digest = md5Hex(data);
  return { body: data, digest: () => digest };
}

/**
 * Iterates the chunks of any upload source
 */
export async function* sourceChunks(source: UploadSource | undefined): AsyncGenerator<Uint8Array> {
  if (source === undefined) {
    return;
  }
  if (typeof source === 'string') {
    yield encoder.encode(source);
    return;
  }
  if (source instanceof Uint8Array) {
    yield source;
    return;
  }
  if (source instanceof ReadableStream) {
    const reader = source.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          return;
        }
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
  yield* source;
}
