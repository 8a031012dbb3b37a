import type { InputContext, JsonValue, ToolDefinitionOf, ToolKind } from "@tooldeck/core";
import type { ToolFailure } from "../errors";

export type ToolExecutionContext = {
  /** Aborted when the session closes or the caller cancels the request. */
  signal?: AbortSignal;
};

export type ExecutionResult = { ok: true; output: JsonValue } | { ok: false; error: ToolFailure };

/** One implementation per tool kind. Executors keep no state between invocations. */
export interface ToolExecutor<K extends ToolKind = ToolKind> {
  readonly kind: K;
  execute(tool: ToolDefinitionOf<K>, input: InputContext, context?: ToolExecutionContext): Promise<ExecutionResult>;
}
