import type { InputContext, JsonValue, ToolDefinitionOf, ToolKind } from "@tooldeck/core";
import { ExecutorFailed, SchemaValidationFailed, errorMessage, isToolFailure, type ValidationPhase } from "../../errors";
import { validate, type ValidationError } from "../../schema";
import type { TemplateEngine } from "../../templates";
import type { ExecutionResult, ToolExecutionContext, ToolExecutor } from "../types";
import { runWithDeadline } from "./deadline";

export const DEFAULT_TIMEOUT_MS = 30_000;

function schemaFailure(phase: ValidationPhase, error: ValidationError, raw?: string) {
  return new SchemaValidationFailed(phase, error.path, error.expected, error.actual, error.message, raw);
}

/** JSON when the text parses, otherwise the text itself. */
export function parseToolOutput(raw: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

/**
 * Shared invocation pipeline: validate input, perform the action under a
 * deadline, parse and validate output. Failures come back as results, never thrown.
 */
export abstract class TemplatedExecutor<K extends ToolKind> implements ToolExecutor<K> {
  abstract readonly kind: K;

  protected constructor(
    protected readonly templates: TemplateEngine,
    private readonly defaultTimeoutMs: number
  ) {}

  protected abstract timeoutOf(tool: ToolDefinitionOf<K>): number | undefined;

  /** Render and run the tool; resolves with the raw output text. */
  protected abstract perform(tool: ToolDefinitionOf<K>, input: InputContext, signal: AbortSignal): Promise<string>;

  async execute(
    tool: ToolDefinitionOf<K>,
    input: InputContext,
    context: ToolExecutionContext = {}
  ): Promise<ExecutionResult> {
    try {
      const inputError = validate(input, tool.inputSchema, "input");
      if (inputError) throw schemaFailure("input", inputError);

      const timeoutMs = this.timeoutOf(tool) ?? this.defaultTimeoutMs;
      const raw = await runWithDeadline(timeoutMs, context.signal, (signal) => this.perform(tool, input, signal));

      const output = parseToolOutput(raw);
      const outputError = validate(output, tool.outputSchema, "output");
      if (outputError) throw schemaFailure("output", outputError, raw);
      return { ok: true, output };
    } catch (err) {
      if (isToolFailure(err)) return { ok: false, error: err };
      return { ok: false, error: new ExecutorFailed(errorMessage(err), { cause: err }) };
    }
  }
}
