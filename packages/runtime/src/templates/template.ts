import { RenderError, errorMessage } from "../errors";
import { createDefaultFormatters, formatValue, type FormatterRegistry } from "./formatters";

export const INPUT_ROOT = "input";

export type TemplateNode =
  | { kind: "literal"; text: string }
  | {
      kind: "lookup";
      /** Segments after `input`; empty for the whole input. */
      path: string[];
      formatter?: string;
      /** The expression as written, braces included. */
      source: string;
    };

export type CompiledTemplate = {
  source: string;
  nodes: TemplateNode[];
};

// `{ input.a.b }` or `{ input.a.b | formatter }`, matched at a single position.
const EXPRESSION = /\{\s*input((?:\.[A-Za-z0-9_-]+)*)\s*(?:\|\s*([A-Za-z_][A-Za-z0-9_]*)\s*)?\}/y;

/**
 * Splits a template into literal and lookup nodes. A `{` that does not open
 * a well-formed expression is kept as literal text.
 */
export function parseTemplate(template: string): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let literal = "";
  let i = 0;

  while (i < template.length) {
    const open = template.indexOf("{", i);
    if (open < 0) {
      literal += template.slice(i);
      break;
    }
    literal += template.slice(i, open);
    EXPRESSION.lastIndex = open;
    const match = EXPRESSION.exec(template);
    if (!match) {
      literal += "{";
      i = open + 1;
      continue;
    }
    if (literal) {
      nodes.push({ kind: "literal", text: literal });
      literal = "";
    }
    const path = match[1] ? match[1].slice(1).split(".") : [];
    nodes.push({
      kind: "lookup",
      path,
      ...(match[2] ? { formatter: match[2] } : {}),
      source: match[0],
    });
    i = open + match[0].length;
  }

  if (literal) nodes.push({ kind: "literal", text: literal });
  return nodes;
}

function describePath(path: string[]): string {
  return [INPUT_ROOT, ...path].join(".");
}

type LookupNode = Extract<TemplateNode, { kind: "lookup" }>;

function resolvePath(input: unknown, node: LookupNode): unknown {
  let current: unknown = input;
  const walked: string[] = [];
  for (const segment of node.path) {
    walked.push(segment);
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) {
        throw new RenderError(node.source, describePath(walked), `"${segment}" is not an array index`);
      }
      const index = Number(segment);
      if (index >= current.length) {
        throw new RenderError(node.source, describePath(walked), `index ${index} is out of range`);
      }
      current = current[index];
    } else if (typeof current === "object" && current !== null) {
      if (!Object.hasOwn(current, segment)) {
        throw new RenderError(node.source, describePath(walked), "value is missing");
      }
      current = Reflect.get(current, segment);
    } else {
      throw new RenderError(node.source, describePath(walked), `cannot read "${segment}" of ${typeof current}`);
    }
  }
  if (current === undefined) {
    throw new RenderError(node.source, describePath(node.path), "value is missing");
  }
  return current;
}

export class TemplateEngine {
  constructor(private readonly formatters: FormatterRegistry = createDefaultFormatters()) {}

  private unknownFormatter(node: LookupNode): RenderError {
    const known = this.formatters.names().join(", ") || "none";
    return new RenderError(node.source, describePath(node.path), `unknown formatter "${node.formatter}" (known: ${known})`);
  }

  /** Parses and checks formatter names without an input, so bad templates fail at startup. */
  compile(template: string): CompiledTemplate {
    const nodes = parseTemplate(template);
    for (const node of nodes) {
      if (node.kind === "lookup" && node.formatter && !this.formatters.has(node.formatter)) {
        throw this.unknownFormatter(node);
      }
    }
    return { source: template, nodes };
  }

  render(template: string, input: unknown): string {
    let out = "";
    for (const node of this.compile(template).nodes) {
      if (node.kind === "literal") {
        out += node.text;
        continue;
      }
      const value = resolvePath(input, node);
      const format = node.formatter ? this.formatters.get(node.formatter) : formatValue;
      if (!format) throw this.unknownFormatter(node);
      try {
        out += format(value);
      } catch (err) {
        throw new RenderError(node.source, describePath(node.path), errorMessage(err));
      }
    }
    return out;
  }
}
