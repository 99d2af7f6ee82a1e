/**
 * Writer-driven uploads
 */

import type { ReadableStreamDefaultController, UnderlyingSource } from 'node:stream/web';
import type { SwiftObject } from '../entities/index.js';
import { UsageError } from '../errors/index.js';
import type { ObjectHeaders } from '../headers/index.js';
import type { RequestOptions } from '../request/index.js';
import { uploadObject } from './upload.js';

/**
 * Sink handed to a {@link WriterCallback}
 */
export interface UploadWriter {
  /**
   * Queues a chunk for sending. Resolves once the request side has room
   * for more; rejects if the request failed.
   */
  write(chunk: Uint8Array | string): Promise<void>;
}

export type WriterCallback = (writer: UploadWriter) => Promise<void> | void;

interface Waiter {
  resolve: () => void;
  reject: (reason: unknown) => void;
}

const encoder = new TextEncoder();

/**
 * In-memory channel holding at most one chunk between a producer and the
 * request body.
 *
 * `fail()` rejects every pending and future write and errors the readable
 * side, whether or not anybody reads it.
 */
export class UploadPipe implements UnderlyingSource<Uint8Array> {
  readonly readable: ReadableStream<Uint8Array>;

  private controller: ReadableStreamDefaultController<Uint8Array> | undefined;
  private readonly waiters: Waiter[] = [];
  private failure: { reason: unknown } | undefined;
  private finished = false;

  constructor() {
    this.readable = new ReadableStream<Uint8Array>(this, { highWaterMark: 1 });
  }

  start(controller: ReadableStreamDefaultController<Uint8Array>): void {
    this.controller = controller;
  }

  pull(): void {
    this.releaseWaiters();
  }

  cancel(reason: unknown): void {
    this.finished = true;
    this.failure ??= { reason };
    this.rejectWaiters(reason);
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (this.failure !== undefined) {
      throw this.failure.reason;
    }
    if (this.finished) {
      throw new UsageError({ message: 'write after the upload body was closed', code: 'WRITE_AFTER_CLOSE' });
    }
    this.controller?.enqueue(chunk);
    if ((this.controller?.desiredSize ?? 0) > 0) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Ends the body. Later failures no longer affect it.
   */
  close(): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.controller?.close();
    this.releaseWaiters();
  }

  fail(reason: unknown): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.failure = { reason };
    this.controller?.error(reason);
    this.rejectWaiters(reason);
  }

  private releaseWaiters(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve();
    }
  }

  private rejectWaiters(reason: unknown): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(reason);
    }
  }
}

/**
 * Runs `callback` and the upload request concurrently, joined by an
 * {@link UploadPipe}.
 *
 * The pipe is closed when the callback returns and failed when either side
 * fails, so neither side is left waiting on the other. If both fail, the
 * callback's error is thrown.
 */
export async function uploadWithWriter(
  object: SwiftObject,
  callback: WriterCallback,
  headers: ObjectHeaders | undefined,
  opts: RequestOptions | undefined
): Promise<void> {
  const pipe = new UploadPipe();

  const uploadWriter: UploadWriter = {
    write: (chunk) => pipe.write(typeof chunk === 'string' ? encoder.encode(chunk) : chunk),
  };

  const producing = (async (): Promise<void> => {
    try {
      await callback(uploadWriter);
      pipe.close();
    } catch (error) {
      pipe.fail(error);
      throw error;
    }
  })();

  const sending = (async (): Promise<void> => {
    try {
      await uploadObject(object, pipe.readable, headers, opts);
    } catch (error) {
      pipe.fail(error);
      throw error;
    }
    // no-op once the callback has closed the pipe
    pipe.fail(UsageError.writerFinishedLate(object.fullName));
  })();

  const [produced, sent] = await Promise.allSettled([producing, sending]);
  if (produced.status === 'rejected') {
    throw produced.reason;
  }
  if (sent.status === 'rejected') {
    throw sent.reason;
  }
}
