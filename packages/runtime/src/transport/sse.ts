import { once } from "node:events";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import express, { type Express, type Response } from "express";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { SseTransportConfig } from "@tooldeck/core";
import { parseListenAddress } from "../config/address";
import { appendLogLine, logError } from "../logging/server-log";
import { ProtocolConnection, ProtocolDispatcher, type ServerContext } from "../mcp";

type EventStreamSession = {
  transport: SSEServerTransport;
  connection: ProtocolConnection;
  keepAlive: ReturnType<typeof setInterval>;
};

/**
 * Multi-session server: each GET on the stream path opens a session with its
 * own dispatcher; clients post messages to the post path with `?sessionId=`.
 * Requests within a session run concurrently.
 */
export class EventStreamServer {
  readonly app: Express;
  private readonly sessions = new Map<string, EventStreamSession>();
  private server?: Server;

  constructor(
    private readonly context: ServerContext,
    private readonly config: SseTransportConfig
  ) {
    this.app = this.createApp();
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async listen(): Promise<AddressInfo> {
    const { host, port } = parseListenAddress(this.config.address);
    const server = this.app.listen(port, host);
    this.server = server;
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error(`Unexpected listen address for ${this.config.address}`);
    }
    appendLogLine("sse", "listen", `${address.address}:${address.port}${this.config.ssePath}`);
    return address;
  }

  /** Close every session, then stop accepting connections. */
  async close(): Promise<void> {
    const open = [...this.sessions.values()];
    await Promise.all(open.map((session) => session.connection.close()));
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private createApp(): Express {
    const app = express();

    app.get(this.config.ssePath, async (_req, res) => {
      try {
        await this.openSession(res);
      } catch (error) {
        logError("sse", "session-open-failed", error);
        if (!res.headersSent) res.status(500).json({ error: "Could not open session" });
      }
    });

    app.post(this.config.postPath, express.json({ limit: "4mb" }), async (req, res) => {
      const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : "";
      const session = this.sessions.get(sessionId);
      if (!session) {
        res.status(404).json({ error: `Unknown session: ${sessionId}` });
        return;
      }
      try {
        await session.transport.handlePostMessage(req, res, req.body);
      } catch (error) {
        logError(`sse:${sessionId}`, "post-failed", error);
        if (!res.headersSent) res.status(500).json({ error: "Internal server error" });
      }
    });

    return app;
  }

  private async openSession(res: Response): Promise<void> {
    const transport = new SSEServerTransport(this.config.postPath, res);
    const id = transport.sessionId;
    const connection = new ProtocolConnection(transport, new ProtocolDispatcher(this.context, id), {
      label: `sse:${id}`,
      onClose: () => this.dropSession(id),
    });
    const keepAlive = setInterval(() => this.sendKeepAlive(id, res), this.config.keepAliveMs);
    this.sessions.set(id, { transport, connection, keepAlive });
    await connection.start();
    appendLogLine("sse", "session-open", id);
  }

  /** A comment line keeps proxies from timing out idle streams and surfaces dead peers. */
  private sendKeepAlive(id: string, res: Response): void {
    if (res.writableEnded || res.destroyed) {
      this.closeSession(id);
      return;
    }
    res.write(": keep-alive\n\n", (err) => {
      if (err) this.closeSession(id);
    });
  }

  private closeSession(id: string): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.connection.close().catch((err: unknown) => logError(`sse:${id}`, "close-failed", err));
  }

  private dropSession(id: string): void {
    const session = this.sessions.get(id);
    if (!session) return;
    clearInterval(session.keepAlive);
    this.sessions.delete(id);
    appendLogLine("sse", "session-closed", id);
  }
}
