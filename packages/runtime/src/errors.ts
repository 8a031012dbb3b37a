export type ErrorKind =
  | "ConfigError"
  | "RenderError"
  | "SchemaValidationFailed"
  | "ExecutorFailed"
  | "Timeout"
  | "SessionClosed"
  | "Cancelled"
  | "ToolNotFound"
  | "ProtocolSequenceError";

/** Base of every failure the server reports with a kind tag. */
export abstract class ToolServerError extends Error {
  abstract readonly kind: ErrorKind;

  /** Extra fields sent to the caller next to `kind`. */
  details(): Record<string, unknown> {
    return {};
  }
}

/** Malformed configuration. Fatal at startup. */
export class ConfigError extends ToolServerError {
  readonly kind = "ConfigError";

  constructor(message: string, readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

export class RenderError extends ToolServerError {
  readonly kind = "RenderError";

  constructor(
    readonly expression: string,
    readonly path: string,
    reason: string
  ) {
    super(`Cannot render ${expression}: ${reason}`);
    this.name = "RenderError";
  }

  details() {
    return { expression: this.expression, path: this.path };
  }
}

export type ValidationPhase = "input" | "output";

export class SchemaValidationFailed extends ToolServerError {
  readonly kind = "SchemaValidationFailed";

  constructor(
    readonly phase: ValidationPhase,
    readonly path: string,
    readonly expected: string,
    readonly actual: string,
    message: string,
    /** Unparsed tool output, kept for diagnostics on output failures. */
    readonly raw?: string
  ) {
    super(`Invalid ${phase}: ${message}`);
    this.name = "SchemaValidationFailed";
  }

  details() {
    return {
      phase: this.phase,
      path: this.path,
      expected: this.expected,
      actual: this.actual,
      ...(this.raw !== undefined ? { raw: this.raw } : {}),
    };
  }
}

export type ExecutorFailureInfo = {
  exitCode?: number;
  signal?: string;
  stderr?: string;
  status?: number;
  body?: string;
  cause?: unknown;
};

/** Network or process level failure of one invocation. */
export class ExecutorFailed extends ToolServerError {
  readonly kind = "ExecutorFailed";
  readonly exitCode?: number;
  readonly signal?: string;
  readonly stderr?: string;
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, info: ExecutorFailureInfo = {}) {
    super(message, info.cause !== undefined ? { cause: info.cause } : undefined);
    this.name = "ExecutorFailed";
    this.exitCode = info.exitCode;
    this.signal = info.signal;
    this.stderr = info.stderr;
    this.status = info.status;
    this.body = info.body;
  }

  details() {
    const out: Record<string, unknown> = {};
    if (this.exitCode !== undefined) out.exitCode = this.exitCode;
    if (this.signal !== undefined) out.signal = this.signal;
    if (this.stderr !== undefined) out.stderr = this.stderr;
    if (this.status !== undefined) out.status = this.status;
    if (this.body !== undefined) out.body = this.body;
    if (this.cause instanceof Error) out.cause = this.cause.message;
    return out;
  }
}

export class ExecutionTimeout extends ToolServerError {
  readonly kind = "Timeout";

  constructor(readonly timeoutMs: number) {
    super(`Execution exceeded ${timeoutMs}ms`);
    this.name = "ExecutionTimeout";
  }

  details() {
    return { timeoutMs: this.timeoutMs };
  }
}

/** Used as an AbortSignal reason: the invocation was stopped by its session or its caller. */
export class InvocationAborted extends ToolServerError {
  constructor(
    readonly kind: "SessionClosed" | "Cancelled",
    message: string
  ) {
    super(message);
    this.name = "InvocationAborted";
  }
}

export class ToolNotFound extends ToolServerError {
  readonly kind = "ToolNotFound";

  constructor(readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = "ToolNotFound";
  }

  details() {
    return { name: this.toolName };
  }
}

export class ProtocolSequenceError extends ToolServerError {
  readonly kind = "ProtocolSequenceError";

  constructor(method: string, state: string) {
    super(`Request "${method}" is not allowed while the session is ${state}`);
    this.name = "ProtocolSequenceError";
  }
}

/** Failures that end a single tool invocation. */
export type ToolFailure = RenderError | SchemaValidationFailed | ExecutorFailed | ExecutionTimeout | InvocationAborted;

export function isToolFailure(err: unknown): err is ToolFailure {
  return (
    err instanceof RenderError ||
    err instanceof SchemaValidationFailed ||
    err instanceof ExecutorFailed ||
    err instanceof ExecutionTimeout ||
    err instanceof InvocationAborted
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
