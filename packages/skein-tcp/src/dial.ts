import net from "node:net";
import { ConnectionError } from "@skein/wire";
import { createClient, type Client, type ClientConfig } from "@skein/core";
import { parseAddress, type Network } from "./address.ts";
import { SocketStream } from "./socket_stream.ts";

/** Open a socket to `address` and wait until it is connected. */
export function connectSocket(network: Network, address: string): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const addr = parseAddress(network, address);
    const socket =
      addr.network === "unix"
        ? net.createConnection({ path: addr.path })
        : net.createConnection({ host: addr.host, port: addr.port });

    const onError = (err: Error) => {
      socket.off("connect", onConnect);
      reject(ConnectionError.io(err.message, err));
    };
    const onConnect = () => {
      socket.off("error", onError);
      resolve(socket);
    };
    socket.once("error", onError);
    socket.once("connect", onConnect);
  });
}

/**
 * Connect to an RPC server and perform the handshake.
 *
 * @example
 * ```typescript
 * const client = await dial("tcp", "127.0.0.1:1234", { codecType: CodecType.Json });
 * const sum = await client.call<number>("Arith.Add", { num1: 1, num2: 2 }, Arith.methods.Add);
 * ```
 */
export async function dial(network: Network, address: string, config: Partial<ClientConfig> = {}): Promise<Client> {
  const socket = await connectSocket(network, address);
  return createClient(new SocketStream(socket), config);
}
