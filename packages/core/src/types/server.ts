import type { ToolDefinition } from "./tool";
import type { TransportConfig } from "./transport";

export interface ServerInfo {
  name: string;
  version: string;
}

export interface ServerCapabilitiesConfig {
  tools?: { listChanged?: boolean };
}

export interface ServerConfig {
  tools: ToolDefinition[];
  instruction?: string;
  serverInfo?: ServerInfo;
  serverCapabilities?: ServerCapabilitiesConfig;
  transport: TransportConfig;
}
