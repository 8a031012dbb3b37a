import { ExecutionTimeout, InvocationAborted, type ToolFailure } from "../../errors";

/**
 * Run `task` with a signal that aborts after `timeoutMs` (reason: ExecutionTimeout)
 * or when `parent` aborts (reason: the parent's reason).
 */
export async function runWithDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new ExecutionTimeout(timeoutMs)), timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener("abort", onParentAbort, { once: true });
  try {
    return await task(controller.signal);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/** The failure an aborted invocation reports. */
export function abortFailure(signal: AbortSignal): ToolFailure {
  const reason: unknown = signal.reason;
  if (reason instanceof ExecutionTimeout || reason instanceof InvocationAborted) return reason;
  return new InvocationAborted("Cancelled", "Invocation was cancelled");
}
