import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { appendLogLine, getLogPath, logError } from "@tooldeck/runtime";

function logLines(): string[] {
  return fs.readFileSync(getLogPath(), "utf8").split("\n");
}

describe("server log", () => {
  it("lives in the configured data dir", () => {
    expect(getLogPath()).toBe(path.join(path.normalize(process.env.TOOLDECK_DATA_DIR ?? ""), "tooldeck.log"));
  });

  it("appends scope, event and message", () => {
    appendLogLine("log-test", "append", "first line");
    const line = logLines().find((entry) => entry.includes("| log-test | append |"));
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \| log-test \| append \| first line$/);
  });

  it("writes errors with their stack frames indented below", () => {
    logError("log-test", "failure", new Error("went wrong"));
    const lines = logLines();
    const at = lines.findIndex((entry) => entry.endsWith("| log-test | failure | went wrong"));
    expect(at).toBeGreaterThanOrEqual(0);
    expect(lines[at + 1]).toMatch(/^ {4}at /);
  });

  it("writes non-Error values as text", () => {
    logError("log-test", "odd", 42);
    expect(logLines().some((entry) => entry.endsWith("| log-test | odd | 42"))).toBe(true);
  });
});
