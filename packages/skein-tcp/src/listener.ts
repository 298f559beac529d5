import net from "node:net";
import { ConnectionError, type ByteStream } from "@skein/wire";
import { createChannel, createLogger, type Channel, type Listener, type Logger } from "@skein/core";
import { formatAddress, parseAddress, type Network, type SocketAddress } from "./address.ts";
import { SocketStream } from "./socket_stream.ts";

export interface ListenOptions {
  /** Accepted connections waiting for accept(); more are dropped. Defaults to 128. */
  backlog?: number;
  logger?: Logger;
}

/** Accepts socket connections for Server.accept. */
export class TcpListener implements Listener {
  private readonly queue: Channel<SocketStream>;

  constructor(
    private readonly server: net.Server,
    private readonly bound: SocketAddress,
    backlog: number,
    private readonly logger: Logger,
  ) {
    this.queue = createChannel<SocketStream>(backlog);
    server.on("error", (err: Error) => {
      this.logger.error("listener error", { error: err.message });
    });
    server.on("connection", (socket) => {
      if (!this.queue.send(new SocketStream(socket))) {
        this.logger.warn("dropping connection", { remote: `${socket.remoteAddress}:${socket.remotePort}` });
        socket.destroy();
      }
    });
  }

  /** Address actually bound; for tcp this carries the assigned port. */
  get address(): string {
    const info = this.server.address();
    if (info !== null && typeof info === "object" && this.bound.network === "tcp") {
      return formatAddress({ network: "tcp", host: this.bound.host, port: info.port });
    }
    return formatAddress(this.bound);
  }

  async accept(): Promise<ByteStream> {
    const stream = await this.queue.recv();
    if (stream === null) throw ConnectionError.closed();
    return stream;
  }

  /**
   * Stop listening. Pending accept() calls reject with "closed";
   * connections already handed out stay open.
   */
  close(): void {
    if (this.queue.isClosed()) return;
    this.queue.close();
    this.server.close();
  }
}

/** Listen for connections on `address` ("host:port" for tcp, a path for unix). */
export function listen(network: Network, address: string, options: ListenOptions = {}): Promise<TcpListener> {
  return new Promise((resolve, reject) => {
    const bound = parseAddress(network, address);
    const backlog = options.backlog ?? 128;
    const server = net.createServer();
    const listener = new TcpListener(server, bound, backlog, options.logger ?? createLogger("skein:tcp"));

    const onError = (err: Error) => {
      reject(ConnectionError.io(err.message, err));
    };
    server.once("error", onError);
    server.once("listening", () => {
      server.off("error", onError);
      resolve(listener);
    });

    if (bound.network === "unix") {
      server.listen({ path: bound.path, backlog });
    } else {
      server.listen({ host: bound.host, port: bound.port, backlog });
    }
  });
}
