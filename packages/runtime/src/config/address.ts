import { ConfigError } from "../errors";

export type ListenAddress = { host: string; port: number };

/** `host:port`, with IPv6 hosts in brackets (`[::1]:8000`). Port 0 picks a free port. */
export function parseListenAddress(address: string, path?: string): ListenAddress {
  const match = /^(?:\[([^\]]+)\]|([^:\s]+)):(\d{1,5})$/.exec(address.trim());
  const port = match ? Number(match[3]) : NaN;
  if (!match || port > 65_535) {
    throw new ConfigError(`invalid address "${address}", expected host:port`, path);
  }
  return { host: match[1] ?? match[2], port };
}
