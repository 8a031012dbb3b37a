import { describe, it, expect } from "vitest";
import type { CommandToolDefinition, HttpToolDefinition, ToolDefinition } from "@tooldeck/core";
import { ConfigError, ToolRegistry } from "@tooldeck/runtime";
import { fakeExecutors, outputOf } from "./helpers";

const weather: HttpToolDefinition = {
  kind: "http",
  name: "weather",
  description: "Current weather",
  httpMetadata: { url: "https://weather.test/now?city={input.city|url_encode}", method: "GET", headers: {} },
};

const listFiles: CommandToolDefinition = {
  kind: "command",
  name: "list_files",
  description: "List a directory",
  commandMetadata: { command: "ls", args: ["-1", "{input.dir}"] },
};

describe("ToolRegistry", () => {
  it("lists definitions in configuration order", () => {
    const registry = ToolRegistry.build([listFiles, weather], fakeExecutors().executors);
    expect(registry.list().map((tool) => tool.name)).toEqual(["list_files", "weather"]);
    expect(registry.size).toBe(2);
  });

  it("looks tools up by name", () => {
    const registry = ToolRegistry.build([weather], fakeExecutors().executors);
    expect(registry.lookup("weather")?.definition).toBe(weather);
    expect(registry.lookup("nope")).toBeUndefined();
  });

  it("routes each tool to the executor of its kind", async () => {
    const { executors, httpRun, commandRun } = fakeExecutors();
    const registry = ToolRegistry.build([weather, listFiles], executors);
    const tool = registry.lookup("list_files");
    if (!tool) throw new Error("list_files is not registered");
    expect(await outputOf(tool.invoke({ dir: "/tmp" }))).toBe("command");
    expect(commandRun).toHaveBeenCalledWith({ dir: "/tmp" }, undefined);
    expect(httpRun).not.toHaveBeenCalled();
  });

  it("rejects duplicate names", () => {
    expect(() => ToolRegistry.build([weather, weather], fakeExecutors().executors)).toThrow(
      new ConfigError('duplicate tool name "weather"', "tools[1]")
    );
  });

  it("rejects templates with unknown formatters, naming the field", () => {
    const bad: ToolDefinition = {
      ...weather,
      httpMetadata: { ...weather.httpMetadata, headers: { "X-Key": "{input.key|shout}" } },
    };
    expect(() => ToolRegistry.build([bad], fakeExecutors().executors)).toThrow(
      'tools[0].headers.X-Key: Cannot render {input.key|shout}: unknown formatter "shout"'
    );
  });

  it("cannot be changed through list()", () => {
    const registry = ToolRegistry.build([weather], fakeExecutors().executors);
    expect(Object.isFrozen(registry.list())).toBe(true);
  });
});
