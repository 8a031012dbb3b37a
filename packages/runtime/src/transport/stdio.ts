import type { Readable, Writable } from "node:stream";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { appendLogLine } from "../logging/server-log";
import { ProtocolConnection, ProtocolDispatcher, type ServerContext } from "../mcp";

export type StdioStreams = {
  stdin: Readable;
  stdout: Writable;
};

/** Resolves when the stream has no more data to give. */
function whenEnded(stream: Readable): Promise<void> {
  return new Promise((resolve) => {
    if (stream.readableEnded) {
      resolve();
      return;
    }
    const done = () => {
      stream.off("end", done);
      stream.off("close", done);
      resolve();
    };
    stream.on("end", done);
    stream.on("close", done);
  });
}

/**
 * A single session over newline-delimited JSON on stdin/stdout.
 * Requests are answered in the order they arrive.
 */
export class StdioServer {
  private connection?: ProtocolConnection;

  constructor(
    private readonly context: ServerContext,
    private readonly streams: StdioStreams = { stdin: process.stdin, stdout: process.stdout }
  ) {}

  /** Serve until stdin ends or close() is called. Pending replies are written before it resolves. */
  async serve(): Promise<void> {
    const { stdin, stdout } = this.streams;
    const connection = new ProtocolConnection(
      new StdioServerTransport(stdin, stdout),
      new ProtocolDispatcher(this.context, "stdio"),
      { label: "stdio", sequential: true }
    );
    this.connection = connection;
    const ended = whenEnded(stdin);

    await connection.start();
    appendLogLine("stdio", "start", `serving ${this.context.registry.size} tools`);

    await Promise.race([ended, connection.closed]);
    await connection.drain();
    await connection.close();
    appendLogLine("stdio", "stop", "input closed");
  }

  async close(): Promise<void> {
    await this.connection?.close();
  }
}
