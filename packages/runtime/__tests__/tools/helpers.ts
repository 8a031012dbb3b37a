import { vi } from "vitest";
import type { InputContext } from "@tooldeck/core";
import { abortFailure, type ExecutionResult, type ToolExecutionContext, type ToolExecutors } from "@tooldeck/runtime";

export async function outputOf(pending: Promise<ExecutionResult>) {
  const result = await pending;
  if (!result.ok) throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  return result.output;
}

export async function failureOf(pending: Promise<ExecutionResult>) {
  const result = await pending;
  if (result.ok) throw new Error(`expected failure, got ${JSON.stringify(result.output)}`);
  return result.error;
}

/** Executors whose behaviour each test scripts through `vi.fn` mocks. */
export function fakeExecutors(
  http: (input: InputContext, signal?: AbortSignal) => Promise<ExecutionResult> = async () => ({ ok: true, output: "http" }),
  command: (input: InputContext, signal?: AbortSignal) => Promise<ExecutionResult> = async () => ({ ok: true, output: "command" })
) {
  const httpRun = vi.fn(http);
  const commandRun = vi.fn(command);
  const executors: ToolExecutors = {
    http: { kind: "http", execute: (_tool, input, context?: ToolExecutionContext) => httpRun(input, context?.signal) },
    command: { kind: "command", execute: (_tool, input, context?: ToolExecutionContext) => commandRun(input, context?.signal) },
  };
  return { executors, httpRun, commandRun };
}

/** Resolves with a failure once `signal` aborts; never settles otherwise. */
export function untilAborted(signal?: AbortSignal): Promise<ExecutionResult> {
  return new Promise((resolve) => {
    signal?.addEventListener("abort", () => resolve({ ok: false, error: abortFailure(signal) }), { once: true });
  });
}
