// Byte-stream abstraction under the codecs.
//
// A ByteStream is a reliable, ordered, bidirectional connection. Transports
// (TCP sockets, the in-memory pipe) feed incoming chunks into a ReadBuffer,
// which serves exact-length reads.

import { concat } from "@skein/postcard";
import { ConnectionError } from "./errors.ts";

export interface ByteStream {
  /**
   * Resolve with exactly `n` bytes.
   *
   * Rejects with kind "eof" when the stream ended before any byte of this
   * read arrived, "io" on a short read or transport failure, and "closed"
   * after close(). Only one read may be outstanding at a time.
   */
  readExact(n: number): Promise<Uint8Array>;

  /** Write all of `bytes`. Rejects with kind "io" if the stream is closed or fails. */
  write(bytes: Uint8Array): Promise<void>;

  /** Close the stream. Idempotent; a pending read is woken with "closed". */
  close(): void;

  readonly closed: boolean;
}

interface PendingRead {
  n: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (err: ConnectionError) => void;
}

/**
 * Accumulates incoming chunks and hands out exact-length reads.
 *
 * The producer side calls push/end/fail; the consumer side calls readExact.
 */
export class ReadBuffer {
  private buf: Uint8Array = new Uint8Array(0);
  private waiter: PendingRead | null = null;
  private ended = false;
  private failure: ConnectionError | null = null;

  get buffered(): number {
    return this.buf.length;
  }

  push(chunk: Uint8Array): void {
    if (this.ended || this.failure) return;
    this.buf = this.buf.length === 0 ? new Uint8Array(chunk) : concat(this.buf, chunk);
    this.flush();
  }

  /** The peer finished sending. */
  end(): void {
    this.ended = true;
    this.flush();
  }

  /** The stream broke; buffered bytes are dropped. */
  fail(err: ConnectionError): void {
    if (this.failure) return;
    this.failure = err;
    this.buf = new Uint8Array(0);
    this.flush();
  }

  readExact(n: number): Promise<Uint8Array> {
    if (this.waiter) {
      return Promise.reject(ConnectionError.io("concurrent read on stream"));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { n, resolve, reject };
      this.flush();
    });
  }

  private flush(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    if (this.failure) {
      this.waiter = null;
      waiter.reject(this.failure);
    } else if (this.buf.length >= waiter.n) {
      this.waiter = null;
      const out = this.buf.slice(0, waiter.n);
      this.buf = this.buf.subarray(waiter.n);
      waiter.resolve(out);
    } else if (this.ended) {
      this.waiter = null;
      const have = this.buf.length;
      this.buf = new Uint8Array(0);
      waiter.reject(
        have === 0
          ? ConnectionError.eof()
          : ConnectionError.io(`unexpected end of stream: got ${have} of ${waiter.n} bytes`),
      );
    }
  }
}
