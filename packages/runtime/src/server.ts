import type { AddressInfo } from "node:net";
import type { ServerConfig } from "@tooldeck/core";
import { createServerContext } from "./mcp";
import type { ExecutorOptions } from "./tools";
import { EventStreamServer, StdioServer, type StdioStreams } from "./transport";

export type StartOptions = Omit<ExecutorOptions, "templates"> & {
  /** Streams for the stdio transport; process stdin/stdout by default. */
  stdio?: StdioStreams;
};

export type RunningServer = {
  transport: "stdio" | "sse";
  /** Bound address of the event-stream transport. */
  address?: AddressInfo;
  /** Settles when the server has stopped serving. */
  done: Promise<void>;
  close(): Promise<void>;
};

/** Build the tool registry from `config` and start its transport. */
export async function startServer(config: ServerConfig, options: StartOptions = {}): Promise<RunningServer> {
  const { stdio, ...executorOptions } = options;
  const context = createServerContext(config, executorOptions);

  if (config.transport.type === "stdio") {
    const server = new StdioServer(context, stdio);
    return { transport: "stdio", done: server.serve(), close: () => server.close() };
  }

  const server = new EventStreamServer(context, config.transport.sse);
  const address = await server.listen();
  let stopped: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    stopped = resolve;
  });
  return {
    transport: "sse",
    address,
    done,
    close: async () => {
      try {
        await server.close();
      } finally {
        stopped();
      }
    },
  };
}
