import type { Schema } from "./schema";

export type ToolKind = "http" | "command";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpToolMetadata {
  /** Template rendered against the call input. */
  url: string;
  method: HttpMethod;
  /** Header name to value template. */
  headers: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface CommandToolMetadata {
  /** Executable path or name. Never templated. */
  command: string;
  args: string[];
  stdin?: string;
  timeoutMs?: number;
}

export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

interface ToolDefinitionBase {
  name: string;
  description: string;
  inputSchema?: Schema;
  outputSchema?: Schema;
  annotations?: ToolAnnotations;
}

export interface HttpToolDefinition extends ToolDefinitionBase {
  kind: "http";
  httpMetadata: HttpToolMetadata;
}

export interface CommandToolDefinition extends ToolDefinitionBase {
  kind: "command";
  commandMetadata: CommandToolMetadata;
}

export type ToolDefinition = HttpToolDefinition | CommandToolDefinition;

type ToolDefinitionsByKind = {
  http: HttpToolDefinition;
  command: CommandToolDefinition;
};

export type ToolDefinitionOf<K extends ToolKind> = ToolDefinitionsByKind[K];

/** Arguments of one tool call, addressed as `input` in templates. */
export type InputContext = Readonly<Record<string, unknown>>;
