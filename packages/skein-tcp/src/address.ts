export type Network = "tcp" | "unix";

export type SocketAddress = { network: "tcp"; host: string; port: number } | { network: "unix"; path: string };

/**
 * Parse a dial/listen address: "host:port" for tcp (IPv6 hosts in
 * brackets), a filesystem path for unix.
 */
export function parseAddress(network: Network, address: string): SocketAddress {
  if (network === "unix") {
    if (address === "") throw new Error("invalid address: empty socket path");
    return { network, path: address };
  }

  const lastColon = address.lastIndexOf(":");
  if (lastColon < 0) {
    throw new Error(`invalid address: ${address}`);
  }
  let host = address.slice(0, lastColon);
  const portText = address.slice(lastColon + 1);
  const port = Number(portText);
  if (portText === "" || !Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new Error(`invalid port in address: ${address}`);
  }
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  }
  return { network, host: host === "" ? "localhost" : host, port };
}

export function formatAddress(addr: SocketAddress): string {
  if (addr.network === "unix") return addr.path;
  return addr.host.includes(":") ? `[${addr.host}]:${addr.port}` : `${addr.host}:${addr.port}`;
}
