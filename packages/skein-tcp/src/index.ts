// skein-tcp - socket transport for skein RPC (Node.js only)
//
// Provides the socket ByteStream, dial for clients and listen for servers.

export { SocketStream } from "./socket_stream.ts";
export { dial, connectSocket } from "./dial.ts";
export { listen, TcpListener, type ListenOptions } from "./listener.ts";
export { parseAddress, formatAddress, type Network, type SocketAddress } from "./address.ts";

// Re-export the client and server entry points for convenience
export {
  Client,
  Server,
  createClient,
  defineService,
  type ClientConfig,
  type ServerConfig,
  type ServiceDescriptor,
} from "@skein/core";
export { CodecType, ConnectionError, RpcError, RpcErrorCode } from "@skein/wire";
