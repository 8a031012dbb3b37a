import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { isJSONRPCNotification, isJSONRPCRequest, type JSONRPCMessage, type JSONRPCRequest } from "@modelcontextprotocol/sdk/types.js";
import { appendLogLine, logError } from "../logging/server-log";
import type { ProtocolDispatcher } from "./dispatcher";

export type ConnectionOptions = {
  /** Scope used in log lines. */
  label: string;
  /** Answer requests one at a time in arrival order. Otherwise each request runs as soon as it arrives. */
  sequential?: boolean;
  onClose?: () => void;
};

/**
 * Binds one transport to one dispatcher: requests in, replies out.
 * Notifications go straight to the dispatcher; stray responses are logged and dropped.
 */
export class ProtocolConnection {
  private queue: Promise<void> = Promise.resolve();
  private readonly pending = new Set<Promise<void>>();
  private closing = false;
  private done = false;
  private resolveClosed: () => void = () => {};
  readonly closed = new Promise<void>((resolve) => {
    this.resolveClosed = resolve;
  });

  constructor(
    private readonly transport: Transport,
    readonly dispatcher: ProtocolDispatcher,
    private readonly options: ConnectionOptions
  ) {}

  async start(): Promise<void> {
    this.transport.onmessage = (message) => this.receive(message);
    this.transport.onerror = (err) => logError(this.options.label, "transport-error", err);
    this.transport.onclose = () => this.handleClosed();
    await this.transport.start();
  }

  /** Wait for every request received so far to be answered. */
  async drain(): Promise<void> {
    await this.queue;
    await Promise.all([...this.pending]);
  }

  async close(): Promise<void> {
    if (this.done) return;
    this.closing = true;
    this.dispatcher.close();
    try {
      await this.transport.close();
    } finally {
      this.handleClosed();
    }
  }

  private receive(message: JSONRPCMessage): void {
    if (this.closing) return;
    if (isJSONRPCRequest(message)) {
      if (this.options.sequential) {
        this.queue = this.queue.then(() => this.respond(message));
      } else {
        this.track(this.respond(message));
      }
      return;
    }
    if (isJSONRPCNotification(message)) {
      this.dispatcher.handleNotification(message);
      return;
    }
    appendLogLine(this.options.label, "unexpected-message", JSON.stringify(message));
  }

  private track(task: Promise<void>): void {
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }

  private async respond(request: JSONRPCRequest): Promise<void> {
    const reply = await this.dispatcher.handleRequest(request);
    if (!reply || this.closing) return;
    try {
      await this.transport.send(reply);
    } catch (err) {
      logError(this.options.label, "send-failed", err);
    }
  }

  private handleClosed(): void {
    if (this.done) return;
    this.done = true;
    this.closing = true;
    this.dispatcher.close();
    appendLogLine(this.options.label, "closed", "connection closed");
    this.options.onClose?.();
    this.resolveClosed();
  }
}
