/**
 * Helpers for request and response bodies
 */

/**
 * Concatenates byte chunks into one array
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let totalLength = 0;
  for (const chunk of chunks) {
    totalLength += chunk.length;
  }

  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Reads a stream to its end.
 *
 * With `limit`, at most `limit` bytes are kept and the rest of the stream is
 * cancelled.
 */
export async function readStream(
  stream: ReadableStream<Uint8Array>,
  limit: number = Number.POSITIVE_INFINITY
): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalLength = 0;

  try {
    while (totalLength < limit) {
      const { done, value } = await reader.read();
      if (done) {
        return concatBytes(chunks);
      }
      const remaining = limit - totalLength;
      const chunk = value.length > remaining ? value.subarray(0, remaining) : value;
      chunks.push(chunk);
      totalLength += chunk.length;
    }
    await reader.cancel();
    return concatBytes(chunks);
  } finally {
    reader.releaseLock();
  }
}

/**
 * Releases a response body that will not be read
 */
export async function discardBody(body: ReadableStream<Uint8Array> | null): Promise<void> {
  if (body !== null && !body.locked) {
    await body.cancel();
  }
}

/**
 * Wraps a byte array in a stream, in chunks of at most `chunkSize` bytes
 */
export function bytesToStream(data: Uint8Array, chunkSize: number = 65536): ReadableStream<Uint8Array> {
  let offset = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (offset >= data.length) {
        controller.close();
        return;
      }
      const end = Math.min(offset + chunkSize, data.length);
      controller.enqueue(data.slice(offset, end));
      offset = end;
    },
  });
}

/**
 * Adapts an async iterable (such as a Node.js Readable) to a web stream
 */
export function iterableToStream(source: AsyncIterable<Uint8Array>): ReadableStream<Uint8Array> {
  const iterator = source[Symbol.asyncIterator]();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const { done, value } = await iterator.next();
      if (done) {
        controller.close();
      } else {
        controller.enqueue(value);
      }
    },
    async cancel(reason) {
      await iterator.return?.(reason);
    },
  });
}
