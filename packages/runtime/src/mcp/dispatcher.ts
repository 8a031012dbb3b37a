import { isJsonObject, type JsonValue, type ToolDefinition } from "@tooldeck/core";
import {
  CallToolRequestSchema,
  CancelledNotificationSchema,
  ErrorCode,
  InitializeRequestSchema,
  LATEST_PROTOCOL_VERSION,
  McpError,
  SUPPORTED_PROTOCOL_VERSIONS,
  type CallToolResult,
  type InitializeResult,
  type JSONRPCNotification,
  type JSONRPCRequest,
  type ListToolsResult,
  type RequestId,
  type ServerResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import {
  InvocationAborted,
  ProtocolSequenceError,
  SchemaValidationFailed,
  ToolNotFound,
  ToolServerError,
  errorMessage,
} from "../errors";
import { appendLogLine } from "../logging/server-log";
import type { ServerContext } from "./context";

const EARLY_CANCEL_LIMIT = 256;

export type DispatcherState = "uninitialized" | "ready" | "closed";

export type ProtocolError = { code: number; message: string; data?: unknown };

export type ProtocolReply =
  | { jsonrpc: "2.0"; id: RequestId; result: ServerResult }
  | { jsonrpc: "2.0"; id: RequestId; error: ProtocolError };

function codeFor(err: ToolServerError): number {
  switch (err.kind) {
    case "ProtocolSequenceError":
      return ErrorCode.InvalidRequest;
    case "ToolNotFound":
    case "RenderError":
      return ErrorCode.InvalidParams;
    case "SchemaValidationFailed":
      return err instanceof SchemaValidationFailed && err.phase === "input"
        ? ErrorCode.InvalidParams
        : ErrorCode.InternalError;
    case "Timeout":
      return ErrorCode.RequestTimeout;
    case "SessionClosed":
    case "Cancelled":
      return ErrorCode.ConnectionClosed;
    default:
      return ErrorCode.InternalError;
  }
}

export function toProtocolError(err: unknown): ProtocolError {
  if (err instanceof McpError) {
    return { code: err.code, message: err.message, ...(err.data !== undefined ? { data: err.data } : {}) };
  }
  if (err instanceof ToolServerError) {
    return { code: codeFor(err), message: err.message, data: { kind: err.kind, ...err.details() } };
  }
  return { code: ErrorCode.InternalError, message: errorMessage(err) };
}

export function toToolListing(definition: ToolDefinition): Tool {
  const tool: Tool = {
    name: definition.name,
    description: definition.description,
    inputSchema: { ...definition.inputSchema, type: "object" },
  };
  if (definition.outputSchema?.type === "object") {
    tool.outputSchema = { ...definition.outputSchema, type: "object" };
  }
  if (definition.annotations) tool.annotations = definition.annotations;
  return tool;
}

export function toCallToolResult(output: JsonValue): CallToolResult {
  const text = typeof output === "string" ? output : JSON.stringify(output);
  if (isJsonObject(output)) {
    return { content: [{ type: "text", text }], structuredContent: output };
  }
  return { content: [{ type: "text", text }] };
}

/**
 * Protocol state machine for one connection: uninitialized -> ready -> closed.
 * Holds the in-flight calls of its session so they can be cancelled or
 * aborted when the session goes away.
 */
export class ProtocolDispatcher {
  private current: DispatcherState = "uninitialized";
  private readonly inFlight = new Map<RequestId, AbortController>();
  /** Cancellations for requests not started yet (still queued behind others). Oldest dropped first. */
  private readonly cancelledEarly = new Set<RequestId>();

  constructor(
    private readonly context: ServerContext,
    readonly sessionId: string
  ) {}

  get state(): DispatcherState {
    return this.current;
  }

  /** Never rejects. Resolves undefined for a request the client cancelled, which gets no reply. */
  async handleRequest(request: JSONRPCRequest): Promise<ProtocolReply | undefined> {
    if (request.method !== "initialize" && this.cancelledEarly.delete(request.id)) {
      appendLogLine(this.sessionId, "cancelled", `${request.method} ${String(request.id)} cancelled before it started`);
      return undefined;
    }
    try {
      const result = await this.route(request);
      return { jsonrpc: "2.0", id: request.id, result };
    } catch (err) {
      if (err instanceof InvocationAborted && err.kind === "Cancelled") return undefined;
      return { jsonrpc: "2.0", id: request.id, error: toProtocolError(err) };
    }
  }

  handleNotification(notification: JSONRPCNotification): void {
    if (notification.method === "notifications/initialized") {
      appendLogLine(this.sessionId, "initialized", "client ready");
      return;
    }
    if (notification.method !== "notifications/cancelled") return;
    const parsed = CancelledNotificationSchema.safeParse(notification);
    if (!parsed.success) return;
    const { requestId, reason } = parsed.data.params;
    if (requestId === undefined) return;
    const running = this.inFlight.get(requestId);
    if (running) {
      running.abort(new InvocationAborted("Cancelled", reason ?? "Request cancelled by client"));
      return;
    }
    this.cancelledEarly.add(requestId);
    if (this.cancelledEarly.size > EARLY_CANCEL_LIMIT) {
      const [oldest] = this.cancelledEarly;
      this.cancelledEarly.delete(oldest);
    }
  }

  /** Enter the terminal state and abort every in-flight call. */
  close(): void {
    if (this.current === "closed") return;
    this.current = "closed";
    for (const controller of this.inFlight.values()) {
      controller.abort(new InvocationAborted("SessionClosed", "Session closed"));
    }
    this.inFlight.clear();
    this.cancelledEarly.clear();
  }

  private async route(request: JSONRPCRequest): Promise<ServerResult> {
    if (this.current === "closed") throw new ProtocolSequenceError(request.method, this.current);
    if (request.method === "initialize") return this.initialize(request);
    if (this.current === "uninitialized") throw new ProtocolSequenceError(request.method, this.current);

    switch (request.method) {
      case "ping":
        return {};
      case "tools/list":
        return this.listTools();
      case "tools/call":
        return this.callTool(request);
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
    }
  }

  private initialize(request: JSONRPCRequest): InitializeResult {
    if (this.current !== "uninitialized") throw new ProtocolSequenceError(request.method, this.current);
    const parsed = InitializeRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new McpError(ErrorCode.InvalidParams, `Invalid initialize request: ${parsed.error.message}`);
    }
    const requested = parsed.data.params.protocolVersion;
    const protocolVersion = SUPPORTED_PROTOCOL_VERSIONS.includes(requested) ? requested : LATEST_PROTOCOL_VERSION;
    this.current = "ready";
    appendLogLine(this.sessionId, "initialize", `protocol ${protocolVersion}`);

    const { serverInfo, capabilities, instructions } = this.context;
    return { protocolVersion, capabilities, serverInfo, ...(instructions ? { instructions } : {}) };
  }

  private listTools(): ListToolsResult {
    return { tools: this.context.registry.list().map(toToolListing) };
  }

  private async callTool(request: JSONRPCRequest): Promise<CallToolResult> {
    const parsed = CallToolRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new McpError(ErrorCode.InvalidParams, `Invalid tools/call request: ${parsed.error.message}`);
    }
    const { name, arguments: args = {} } = parsed.data.params;
    const tool = this.context.registry.lookup(name);
    if (!tool) throw new ToolNotFound(name);

    if (this.inFlight.has(request.id)) {
      throw new McpError(ErrorCode.InvalidRequest, `Request id ${String(request.id)} is already used by a running call`);
    }
    const controller = new AbortController();
    this.inFlight.set(request.id, controller);
    const started = Date.now();
    try {
      const result = await tool.invoke(args, { signal: controller.signal });
      const elapsed = Date.now() - started;
      if (!result.ok) {
        appendLogLine(this.sessionId, "tools/call", `${name} failed after ${elapsed}ms: ${result.error.kind}: ${result.error.message}`);
        throw result.error;
      }
      appendLogLine(this.sessionId, "tools/call", `${name} ok in ${elapsed}ms`);
      return toCallToolResult(result.output);
    } finally {
      this.inFlight.delete(request.id);
    }
  }
}
