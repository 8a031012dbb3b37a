import type { InputContext, ToolDefinition } from "@tooldeck/core";
import { ConfigError, RenderError } from "../errors";
import { TemplateEngine } from "../templates";
import type { ExecutionResult, ToolExecutionContext, ToolExecutor } from "./types";

export type ToolExecutors = {
  http: ToolExecutor<"http">;
  command: ToolExecutor<"command">;
};

/** A definition bound to the executor of its kind. */
export type RegisteredTool = {
  readonly definition: ToolDefinition;
  invoke(input: InputContext, context?: ToolExecutionContext): Promise<ExecutionResult>;
};

function bind(definition: ToolDefinition, executors: ToolExecutors): RegisteredTool {
  switch (definition.kind) {
    case "http": {
      const tool = definition;
      return { definition, invoke: (input, context) => executors.http.execute(tool, input, context) };
    }
    case "command": {
      const tool = definition;
      return { definition, invoke: (input, context) => executors.command.execute(tool, input, context) };
    }
  }
}

/** Every template of a definition, keyed by where it sits in the tool config. */
function templatesOf(definition: ToolDefinition): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  if (definition.kind === "http") {
    const meta = definition.httpMetadata;
    out.push(["url", meta.url]);
    for (const [name, value] of Object.entries(meta.headers)) out.push([`headers.${name}`, value]);
    if (meta.body !== undefined) out.push(["body", meta.body]);
  } else {
    const meta = definition.commandMetadata;
    meta.args.forEach((value, i) => out.push([`args[${i}]`, value]));
    if (meta.stdin !== undefined) out.push(["stdin", meta.stdin]);
  }
  return out;
}

/**
 * Immutable name-indexed table of tools. Built once before serving; lookups
 * need no locking because nothing writes to it afterwards.
 */
export class ToolRegistry {
  private constructor(
    private readonly byName: ReadonlyMap<string, RegisteredTool>,
    private readonly ordered: readonly ToolDefinition[]
  ) {}

  static build(
    definitions: readonly ToolDefinition[],
    executors: ToolExecutors,
    templates: TemplateEngine = new TemplateEngine()
  ): ToolRegistry {
    const byName = new Map<string, RegisteredTool>();
    definitions.forEach((definition, i) => {
      const where = `tools[${i}]`;
      if (byName.has(definition.name)) {
        throw new ConfigError(`duplicate tool name "${definition.name}"`, where);
      }
      for (const [field, template] of templatesOf(definition)) {
        try {
          templates.compile(template);
        } catch (err) {
          if (err instanceof RenderError) throw new ConfigError(err.message, `${where}.${field}`);
          throw err;
        }
      }
      byName.set(definition.name, bind(definition, executors));
    });
    return new ToolRegistry(byName, Object.freeze([...definitions]));
  }

  lookup(name: string): RegisteredTool | undefined {
    return this.byName.get(name);
  }

  /** Definitions in configuration order. */
  list(): readonly ToolDefinition[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }
}
