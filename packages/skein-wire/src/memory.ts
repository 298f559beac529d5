// In-process ByteStream pair, for tests and same-process wiring.

import { ConnectionError } from "./errors.ts";
import { ReadBuffer, type ByteStream } from "./stream.ts";

export class MemoryStream implements ByteStream {
  readonly incoming = new ReadBuffer();
  peer: MemoryStream | null = null;
  private isClosed = false;

  /** Bytes written by this end, in order. */
  bytesWritten = 0;

  get closed(): boolean {
    return this.isClosed;
  }

  readExact(n: number): Promise<Uint8Array> {
    return this.incoming.readExact(n);
  }

  write(bytes: Uint8Array): Promise<void> {
    if (this.isClosed || !this.peer) {
      return Promise.reject(ConnectionError.io("write on closed stream"));
    }
    this.bytesWritten += bytes.length;
    this.peer.incoming.push(bytes);
    return Promise.resolve();
  }

  /** Finish writing: the peer reads end of stream, this end can still read. */
  end(): void {
    this.peer?.incoming.end();
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.incoming.fail(ConnectionError.closed());
    this.peer?.incoming.end();
  }

  /** Break the connection: both ends see a transport failure. */
  destroy(message = "connection reset"): void {
    const err = ConnectionError.io(message);
    this.isClosed = true;
    this.incoming.fail(err);
    if (this.peer) {
      this.peer.isClosed = true;
      this.peer.incoming.fail(err);
    }
  }
}

/** Create two connected streams: bytes written to one are read from the other. */
export function createMemoryPipe(): [MemoryStream, MemoryStream] {
  const a = new MemoryStream();
  const b = new MemoryStream();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
