import { TemplateEngine } from "../templates";
import { CommandExecutor } from "./adapters/command-tool";
import { HttpExecutor } from "./adapters/http-tool";
import type { ToolExecutors } from "./registry";

export type ExecutorOptions = {
  templates?: TemplateEngine;
  httpTimeoutMs?: number;
  commandTimeoutMs?: number;
};

export function createDefaultExecutors(options: ExecutorOptions = {}): ToolExecutors {
  const templates = options.templates ?? new TemplateEngine();
  return {
    http: new HttpExecutor({ templates, defaultTimeoutMs: options.httpTimeoutMs }),
    command: new CommandExecutor({ templates, defaultTimeoutMs: options.commandTimeoutMs }),
  };
}
