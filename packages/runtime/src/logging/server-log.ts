import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { errorMessage } from "../errors";

const LOG_FILE = "tooldeck.log";

/** `$TOOLDECK_DATA_DIR/tooldeck.log`, or `.data/tooldeck.log` under the working directory. */
export function getLogPath(): string {
  const dataDir = process.env.TOOLDECK_DATA_DIR ?? path.join(process.cwd(), ".data");
  return path.join(path.normalize(dataDir), LOG_FILE);
}

function appendTo(file: string, text: string): boolean {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.appendFileSync(file, text, "utf8");
    return true;
  } catch {
    return false;
  }
}

// stdout carries the stdio protocol, so the temp dir is the only place left.
function write(text: string): void {
  if (!appendTo(getLogPath(), text)) appendTo(path.join(os.tmpdir(), LOG_FILE), text);
}

function formatLine(scope: string, event: string, message: string): string {
  return `${new Date().toISOString()} | ${scope} | ${event} | ${message}\n`;
}

/**
 * Append one line to the server log. Never writes to stdout.
 * Format: `<time> | <scope> | <event> | <message>`
 */
export function appendLogLine(scope: string, event: string, message: string): void {
  write(formatLine(scope, event, message));
}

/** Like appendLogLine, followed by the stack frames of `err`, indented. */
export function logError(scope: string, event: string, err: unknown): void {
  const frames = err instanceof Error && err.stack ? err.stack.split("\n").filter((line) => /^\s+at /.test(line)) : [];
  const trace = frames.map((frame) => `    ${frame.trim()}\n`).join("");
  write(formatLine(scope, event, errorMessage(err)) + trace);
}
