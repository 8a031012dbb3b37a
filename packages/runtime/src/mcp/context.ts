import type { ServerConfig } from "@tooldeck/core";
import type { Implementation, ServerCapabilities } from "@modelcontextprotocol/sdk/types.js";
import { TemplateEngine } from "../templates";
import { ToolRegistry, createDefaultExecutors, type ExecutorOptions } from "../tools";
import { SERVER_NAME, SERVER_VERSION } from "../version";

/** Read-only state shared by every session of one server. */
export type ServerContext = {
  registry: ToolRegistry;
  serverInfo: Implementation;
  capabilities: ServerCapabilities;
  instructions?: string;
};

/** Build the registry and server identity. Throws ConfigError for unusable tool definitions. */
export function createServerContext(config: ServerConfig, options: Omit<ExecutorOptions, "templates"> = {}): ServerContext {
  const templates = new TemplateEngine();
  const registry = ToolRegistry.build(config.tools, createDefaultExecutors({ ...options, templates }), templates);
  return {
    registry,
    serverInfo: config.serverInfo ?? { name: SERVER_NAME, version: SERVER_VERSION },
    capabilities: config.serverCapabilities ?? { tools: {} },
    instructions: config.instruction,
  };
}
