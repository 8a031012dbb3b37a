export const DEFAULT_SSE_PATH = "/sse";
export const DEFAULT_POST_PATH = "/message";
export const DEFAULT_KEEP_ALIVE_MS = 15_000;

export interface SseTransportConfig {
  /** host:port to bind, e.g. "127.0.0.1:8000". Port 0 picks a free port. */
  address: string;
  ssePath: string;
  postPath: string;
  keepAliveMs: number;
}

export type TransportConfig = { type: "stdio" } | { type: "sse"; sse: SseTransportConfig };
