#!/usr/bin/env npx tsx

/**
 * tooldeck: serve HTTP endpoints and local commands as MCP tools,
 * described by a YAML file.
 */

import { parseArgs } from "node:util";
import { loadConfig } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { appendLogLine, getLogPath, logError } from "./logging/server-log";
import { startServer } from "./server";
import { SERVER_NAME, SERVER_VERSION } from "./version";

const USAGE = `Usage: ${SERVER_NAME} -f <config.yaml>

Options:
  -f, --file_path <path>  configuration file
  -v, --version           print the version
  -h, --help              show this help`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      file_path: { type: "string", short: "f" },
      version: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.version) {
    process.stdout.write(`${SERVER_NAME} ${SERVER_VERSION}\n`);
    return 0;
  }
  if (values.help || !values.file_path) {
    process.stderr.write(`${USAGE}\n`);
    return values.help ? 0 : 1;
  }

  const config = await loadConfig(values.file_path);
  const server = await startServer(config);
  const where = server.address ? ` on ${server.address.address}:${server.address.port}` : "";
  // stdout is the protocol channel under stdio, so status goes to stderr.
  process.stderr.write(`${SERVER_NAME} ${SERVER_VERSION}: ${config.tools.length} tools over ${server.transport}${where}, log at ${getLogPath()}\n`);
  appendLogLine("cli", "start", `${values.file_path} (${server.transport}${where})`);

  const shutdown = (signal: NodeJS.Signals) => {
    appendLogLine("cli", "signal", signal);
    server.close().catch((err: unknown) => logError("cli", "shutdown-failed", err));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.done;
  appendLogLine("cli", "stop", "server stopped");
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`);
    } else {
      logError("cli", "fatal", err);
      process.stderr.write(`${SERVER_NAME} failed: ${errorMessage(err)}\n`);
    }
    process.exit(1);
  }
);
