import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import * as z from "zod/v4";
import {
  DEFAULT_KEEP_ALIVE_MS,
  DEFAULT_POST_PATH,
  DEFAULT_SSE_PATH,
  type Schema,
  type ServerConfig,
  type ToolAnnotations,
  type ToolDefinition,
  type TransportConfig,
} from "@tooldeck/core";
import { ConfigError, errorMessage } from "../errors";
import { parseListenAddress } from "./address";
import { parseDuration } from "./duration";

const schemaNode: z.ZodType<Schema> = z.lazy(() =>
  z.looseObject({
    type: z.enum(["object", "string", "number", "integer", "boolean", "array", "null"]).optional(),
    description: z.string().optional(),
    properties: z.record(z.string(), schemaNode).optional(),
    required: z.array(z.string()).optional(),
    items: schemaNode.optional(),
  })
);

const inputSchemaNode = schemaNode.refine((schema) => schema.type === undefined || schema.type === "object", {
  message: 'input_schema must have type "object"',
});

const duration = z.union([z.number(), z.string()]);

const httpMetadataSchema = z.object({
  url: z.string().min(1),
  method: z.enum(["GET", "POST", "PUT", "DELETE"]),
  headers: z.record(z.string(), z.string()).optional(),
  body: z.string().optional(),
  input_schema: inputSchemaNode.optional(),
  output_schema: schemaNode.optional(),
  timeout: duration.optional(),
});

const commandMetadataSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  stdin: z.string().optional(),
  input_schema: inputSchemaNode.optional(),
  output_schema: schemaNode.optional(),
  timeout: duration.optional(),
});

const annotationsSchema = z.object({
  title: z.string().optional(),
  read_only_hint: z.boolean().optional(),
  destructive_hint: z.boolean().optional(),
  idempotent_hint: z.boolean().optional(),
  open_world_hint: z.boolean().optional(),
});

const toolSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  tool_type: z.enum(["HTTP", "COMMAND"]),
  http_metadata: httpMetadataSchema.optional(),
  command_metadata: commandMetadataSchema.optional(),
  tool_annotations: annotationsSchema.optional(),
});

const transportSchema = z.object({
  transport_type: z.enum(["STDIO", "SSE"]),
  sse_config: z
    .object({
      address: z.string(),
      sse_path: z.string().startsWith("/").optional(),
      post_path: z.string().startsWith("/").optional(),
      keep_alive_duration: duration.optional(),
    })
    .optional(),
});

const configSchema = z.object({
  tools: z.array(toolSchema),
  instruction: z.string().optional(),
  server_info: z.object({ name: z.string(), version: z.string() }).optional(),
  server_capabilities: z
    .object({
      tools: z.object({ list_changed: z.boolean().optional() }).optional(),
    })
    .optional(),
  transport_config: transportSchema.optional(),
});

type RawConfig = z.infer<typeof configSchema>;
type RawTool = z.infer<typeof toolSchema>;
type RawAnnotations = z.infer<typeof annotationsSchema>;
type RawTransport = z.infer<typeof transportSchema>;

/** `tools[0].http_metadata.url` style path of a zod issue. */
function issuePath(path: readonly PropertyKey[]): string {
  return path.reduce<string>((out, key) => {
    if (typeof key === "number") return `${out}[${key}]`;
    const name = String(key);
    return out ? `${out}.${name}` : name;
  }, "");
}

function toAnnotations(raw: RawAnnotations): ToolAnnotations {
  const annotations: ToolAnnotations = {};
  if (raw.title !== undefined) annotations.title = raw.title;
  if (raw.read_only_hint !== undefined) annotations.readOnlyHint = raw.read_only_hint;
  if (raw.destructive_hint !== undefined) annotations.destructiveHint = raw.destructive_hint;
  if (raw.idempotent_hint !== undefined) annotations.idempotentHint = raw.idempotent_hint;
  if (raw.open_world_hint !== undefined) annotations.openWorldHint = raw.open_world_hint;
  return annotations;
}

function toToolDefinition(raw: RawTool, where: string): ToolDefinition {
  const common = {
    name: raw.name,
    description: raw.description,
    ...(raw.tool_annotations ? { annotations: toAnnotations(raw.tool_annotations) } : {}),
  };

  if (raw.tool_type === "HTTP") {
    const meta = raw.http_metadata;
    if (!meta) throw new ConfigError("http_metadata is required for tool_type HTTP", where);
    if (meta.method === "GET" && meta.body !== undefined) {
      throw new ConfigError("GET requests cannot have a body", `${where}.http_metadata.body`);
    }
    return {
      ...common,
      kind: "http",
      inputSchema: meta.input_schema,
      outputSchema: meta.output_schema,
      httpMetadata: {
        url: meta.url,
        method: meta.method,
        headers: meta.headers ?? {},
        body: meta.body,
        timeoutMs: meta.timeout === undefined ? undefined : parseDuration(meta.timeout, `${where}.http_metadata.timeout`),
      },
    };
  }

  const meta = raw.command_metadata;
  if (!meta) throw new ConfigError("command_metadata is required for tool_type COMMAND", where);
  return {
    ...common,
    kind: "command",
    inputSchema: meta.input_schema,
    outputSchema: meta.output_schema,
    commandMetadata: {
      command: meta.command,
      args: meta.args ?? [],
      stdin: meta.stdin,
      timeoutMs: meta.timeout === undefined ? undefined : parseDuration(meta.timeout, `${where}.command_metadata.timeout`),
    },
  };
}

function toTransport(raw: RawTransport | undefined): TransportConfig {
  if (!raw || raw.transport_type === "STDIO") return { type: "stdio" };
  const sse = raw.sse_config;
  if (!sse) throw new ConfigError("sse_config is required for transport_type SSE", "transport_config");
  parseListenAddress(sse.address, "transport_config.sse_config.address");
  return {
    type: "sse",
    sse: {
      address: sse.address,
      ssePath: sse.sse_path ?? DEFAULT_SSE_PATH,
      postPath: sse.post_path ?? DEFAULT_POST_PATH,
      keepAliveMs:
        sse.keep_alive_duration === undefined
          ? DEFAULT_KEEP_ALIVE_MS
          : parseDuration(sse.keep_alive_duration, "transport_config.sse_config.keep_alive_duration"),
    },
  };
}

function toServerConfig(raw: RawConfig): ServerConfig {
  const config: ServerConfig = {
    tools: raw.tools.map((tool, i) => toToolDefinition(tool, `tools[${i}]`)),
    transport: toTransport(raw.transport_config),
  };
  if (raw.instruction !== undefined) config.instruction = raw.instruction;
  if (raw.server_info) config.serverInfo = raw.server_info;
  if (raw.server_capabilities) {
    const listChanged = raw.server_capabilities.tools?.list_changed;
    config.serverCapabilities = { tools: listChanged === undefined ? {} : { listChanged } };
  }
  return config;
}

/** Parse YAML configuration text. Throws ConfigError naming the offending path. */
export function parseConfig(text: string): ServerConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${errorMessage(err)}`);
  }

  const parsed = configSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issuePath(issue.path) : "";
    throw new ConfigError(issue?.message ?? "invalid configuration", where || undefined);
  }
  return toServerConfig(parsed.data);
}

export async function loadConfig(filePath: string): Promise<ServerConfig> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config file: ${errorMessage(err)}`, filePath);
  }
  return parseConfig(text);
}
