import { createServer, type IncomingMessage, type Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { HttpToolDefinition } from "@tooldeck/core";
import { ExecutionTimeout, ExecutorFailed, HttpExecutor, SchemaValidationFailed } from "@tooldeck/runtime";
import { failureOf, outputOf } from "./helpers";

type Seen = { method?: string; url?: string; headers: IncomingMessage["headers"]; body: string };

let server: Server;
let base = "";
const seen: Seen[] = [];

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve) => {
    let data = "";
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => (data += chunk));
    req.on("end", () => resolve(data));
  });
}

beforeAll(async () => {
  server = createServer(async (req, res) => {
    const body = await readBody(req);
    seen.push({ method: req.method, url: req.url, headers: req.headers, body });
    if (req.url?.startsWith("/slow")) return; // never answers
    if (req.url === "/fail") {
      res.writeHead(500, { "content-type": "text/plain" });
      res.end("nope");
      return;
    }
    if (req.url === "/text") {
      res.end("plain words");
      return;
    }
    if (req.url === "/echo") {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(body);
      return;
    }
    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ path: req.url, auth: req.headers.authorization ?? null }));
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("test server has no port");
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  seen.length = 0;
});

function httpTool(meta: Partial<HttpToolDefinition["httpMetadata"]>, extra: Partial<HttpToolDefinition> = {}): HttpToolDefinition {
  return {
    kind: "http",
    name: "call",
    description: "calls the test server",
    httpMetadata: { url: `${base}/`, method: "GET", headers: {}, ...meta },
    ...extra,
  };
}

describe("HttpExecutor", () => {
  const executor = new HttpExecutor();

  it("renders url and headers and parses a JSON response", async () => {
    const tool = httpTool({
      url: `${base}/users/{input.id}?q={input.q|url_encode}`,
      headers: { Authorization: "Bearer {input.token}" },
    });
    const output = await outputOf(executor.execute(tool, { id: 7, q: "a b", token: "test-secret" }));
    expect(output).toEqual({ path: "/users/7?q=a%20b", auth: "Bearer test-secret" });
    expect(seen[0]?.method).toBe("GET");
  });

  it("sends the rendered body", async () => {
    const tool = httpTool({ url: `${base}/echo`, method: "POST", body: '{"name": "{input.name}"}' });
    expect(await outputOf(executor.execute(tool, { name: "Ada" }))).toEqual({ name: "Ada" });
    expect(seen[0]?.body).toBe('{"name": "Ada"}');
  });

  it("returns non-JSON bodies as text", async () => {
    expect(await outputOf(executor.execute(httpTool({ url: `${base}/text` }), {}))).toBe("plain words");
  });

  it("reports error statuses with the body", async () => {
    const error = await failureOf(executor.execute(httpTool({ url: `${base}/fail`, method: "DELETE" }), {}));
    expect(error).toBeInstanceOf(ExecutorFailed);
    expect(error.message).toBe(`DELETE ${base}/fail responded with status 500`);
    if (error instanceof ExecutorFailed) {
      expect(error.status).toBe(500);
      expect(error.body).toBe("nope");
    }
  });

  it("times out on a server that does not answer", async () => {
    const error = await failureOf(executor.execute(httpTool({ url: `${base}/slow`, timeoutMs: 200 }), {}));
    expect(error).toBeInstanceOf(ExecutionTimeout);
    expect(error.message).toBe("Execution exceeded 200ms");
  });

  it("reports connection failures", async () => {
    const error = await failureOf(executor.execute(httpTool({ url: "http://127.0.0.1:1/" }), {}));
    expect(error).toBeInstanceOf(ExecutorFailed);
    expect(error.message.startsWith("GET http://127.0.0.1:1/ failed:")).toBe(true);
  });

  it("sends nothing when input is invalid", async () => {
    const tool = httpTool({}, { inputSchema: { type: "object", required: ["id"] } });
    const error = await failureOf(executor.execute(tool, {}));
    expect(error).toBeInstanceOf(SchemaValidationFailed);
    expect(seen).toHaveLength(0);
  });
});
