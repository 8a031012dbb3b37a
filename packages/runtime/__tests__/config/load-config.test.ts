import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { ConfigError, createServerContext, loadConfig, parseConfig } from "@tooldeck/runtime";

const fixtures = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../fixtures");

describe("loadConfig", () => {
  it("maps a full configuration file", async () => {
    const config = await loadConfig(path.join(fixtures, "tools.yaml"));
    expect(config.instruction).toBe("Weather lookups and file listings for the test workspace.");
    expect(config.serverInfo).toEqual({ name: "fixture-server", version: "2.0.0" });
    expect(config.serverCapabilities).toEqual({ tools: { listChanged: false } });
    expect(config.transport).toEqual({
      type: "sse",
      sse: { address: "127.0.0.1:8000", ssePath: "/sse", postPath: "/message", keepAliveMs: 90_000 },
    });
    expect(config.tools).toEqual([
      {
        kind: "http",
        name: "weather",
        description: "Current weather for a city",
        annotations: { title: "Weather", readOnlyHint: true, openWorldHint: true },
        inputSchema: {
          type: "object",
          properties: { city: { type: "string", description: "City name" } },
          required: ["city"],
        },
        outputSchema: { type: "object", properties: { temp: { type: "number" } } },
        httpMetadata: {
          url: "https://weather.test/now?city={ input.city | url_encode }",
          method: "GET",
          headers: { Authorization: "Bearer test-secret" },
          timeoutMs: 5000,
        },
      },
      {
        kind: "command",
        name: "list_files",
        description: "List a directory",
        commandMetadata: { command: "ls", args: ["-1", "{ input.dir }"] },
      },
    ]);
  });

  it("defaults to the stdio transport", async () => {
    const config = await loadConfig(path.join(fixtures, "stdio-echo.yaml"));
    expect(config.transport).toEqual({ type: "stdio" });
    expect(config.serverInfo).toBeUndefined();
  });

  it("accepts the bundled example", async () => {
    const config = await loadConfig(path.resolve(fixtures, "../../../../example/tools.yaml"));
    expect(config.tools.map((tool) => tool.name)).toEqual(["disk_usage", "word_count", "create_note"]);
    expect(createServerContext(config).registry.size).toBe(3);
  });

  it("reports unreadable files", async () => {
    await expect(loadConfig(path.join(fixtures, "missing.yaml"))).rejects.toThrow(ConfigError);
  });
});

describe("parseConfig", () => {
  const tool = (body: string) => `tools:\n  - name: t\n    description: d\n${body}`;

  it("rejects invalid YAML", () => {
    expect(() => parseConfig("tools: [")).toThrow(/^invalid YAML/);
  });

  it("names the path of a schema violation", () => {
    const text = tool("    tool_type: HTTP\n    http_metadata:\n      url: https://x.test\n      method: PATCH\n");
    expect(() => parseConfig(text)).toThrow(/^tools\[0\]\.http_metadata\.method: /);
  });

  it("requires the metadata block of the tool type", () => {
    expect(() => parseConfig(tool("    tool_type: COMMAND\n"))).toThrow(
      "tools[0]: command_metadata is required for tool_type COMMAND"
    );
  });

  it("rejects a GET with a body", () => {
    const text = tool("    tool_type: HTTP\n    http_metadata:\n      url: https://x.test\n      method: GET\n      body: '{}'\n");
    expect(() => parseConfig(text)).toThrow("tools[0].http_metadata.body: GET requests cannot have a body");
  });

  it("rejects non-object input schemas", () => {
    const text = tool("    tool_type: COMMAND\n    command_metadata:\n      command: ls\n      input_schema:\n        type: string\n");
    expect(() => parseConfig(text)).toThrow('tools[0].command_metadata.input_schema: input_schema must have type "object"');
  });

  it("requires sse_config for the SSE transport", () => {
    expect(() => parseConfig("tools: []\ntransport_config:\n  transport_type: SSE\n")).toThrow(
      "transport_config: sse_config is required for transport_type SSE"
    );
  });

  it("validates the listen address", () => {
    const text = "tools: []\ntransport_config:\n  transport_type: SSE\n  sse_config:\n    address: nowhere\n";
    expect(() => parseConfig(text)).toThrow("transport_config.sse_config.address: invalid address");
  });

  it("parses timeouts given in milliseconds", () => {
    const config = parseConfig(tool("    tool_type: COMMAND\n    command_metadata:\n      command: ls\n      timeout: 750\n"));
    const [first] = config.tools;
    expect(first?.kind === "command" ? first.commandMetadata.timeoutMs : undefined).toBe(750);
  });

  it("rejects a tool timeout too long for a timer", () => {
    const text = tool("    tool_type: COMMAND\n    command_metadata:\n      command: ls\n      timeout: 30d\n");
    expect(() => parseConfig(text)).toThrow('tools[0].command_metadata.timeout: invalid duration "30d"');
  });

  it("rejects a zero keep-alive", () => {
    const text =
      "tools: []\ntransport_config:\n  transport_type: SSE\n  sse_config:\n    address: 127.0.0.1:0\n    keep_alive_duration: 0s\n";
    expect(() => parseConfig(text)).toThrow("transport_config.sse_config.keep_alive_duration: invalid duration");
  });

  it("keeps unknown schema keywords", () => {
    const text = tool(
      "    tool_type: COMMAND\n    command_metadata:\n      command: ls\n      input_schema:\n        type: object\n        additionalProperties: false\n"
    );
    expect(parseConfig(text).tools[0]?.inputSchema).toEqual({ type: "object", additionalProperties: false });
  });
});
