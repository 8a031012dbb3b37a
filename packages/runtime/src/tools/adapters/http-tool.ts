import type { HttpToolDefinition, InputContext } from "@tooldeck/core";
import { ExecutorFailed, errorMessage } from "../../errors";
import { TemplateEngine } from "../../templates";
import { abortFailure } from "./deadline";
import { DEFAULT_TIMEOUT_MS, TemplatedExecutor } from "./executor-base";

export type HttpExecutorOptions = {
  templates?: TemplateEngine;
  defaultTimeoutMs?: number;
};

// fetch reports socket errors as TypeError("fetch failed") with the real error as cause
function describeFetchError(err: unknown): string {
  if (err instanceof Error && err.cause instanceof Error) return `${err.message}: ${err.cause.message}`;
  return errorMessage(err);
}

export class HttpExecutor extends TemplatedExecutor<"http"> {
  readonly kind = "http";

  constructor(options: HttpExecutorOptions = {}) {
    super(options.templates ?? new TemplateEngine(), options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS);
  }

  protected timeoutOf(tool: HttpToolDefinition) {
    return tool.httpMetadata.timeoutMs;
  }

  protected async perform(tool: HttpToolDefinition, input: InputContext, signal: AbortSignal): Promise<string> {
    const { method } = tool.httpMetadata;
    const url = this.templates.render(tool.httpMetadata.url, input);
    const headers: Record<string, string> = {};
    for (const [name, template] of Object.entries(tool.httpMetadata.headers)) {
      headers[name] = this.templates.render(template, input);
    }
    const body = tool.httpMetadata.body !== undefined ? this.templates.render(tool.httpMetadata.body, input) : undefined;

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, { method, headers, body, signal });
      text = await response.text();
    } catch (err) {
      if (signal.aborted) throw abortFailure(signal);
      throw new ExecutorFailed(`${method} ${url} failed: ${describeFetchError(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new ExecutorFailed(`${method} ${url} responded with status ${response.status}`, {
        status: response.status,
        body: text,
      });
    }
    return text;
  }
}
