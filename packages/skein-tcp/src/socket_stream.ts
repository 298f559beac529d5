// ByteStream over a Node.js socket.

import net from "node:net";
import { ConnectionError, ReadBuffer, type ByteStream } from "@skein/wire";

/**
 * Adapts a connected `net.Socket` to a ByteStream. Incoming data is
 * buffered until read; a socket error fails the pending and later reads.
 */
export class SocketStream implements ByteStream {
  private readonly incoming = new ReadBuffer();
  private isClosed = false;

  constructor(private readonly socket: net.Socket) {
    socket.on("data", (chunk: Buffer) => {
      this.incoming.push(chunk);
    });

    socket.on("end", () => {
      this.incoming.end();
    });

    socket.on("error", (err: Error) => {
      this.incoming.fail(ConnectionError.io(err.message, err));
    });

    socket.on("close", () => {
      this.isClosed = true;
      this.incoming.end();
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Get the underlying socket. */
  getSocket(): net.Socket {
    return this.socket;
  }

  readExact(n: number): Promise<Uint8Array> {
    return this.incoming.readExact(n);
  }

  write(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.isClosed || this.socket.destroyed) {
        reject(ConnectionError.io("write on closed socket"));
        return;
      }
      this.socket.write(bytes, (err) => {
        if (err) reject(ConnectionError.io(err.message, err));
        else resolve();
      });
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.incoming.fail(ConnectionError.closed());
    this.socket.destroy();
  }
}
