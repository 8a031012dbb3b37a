export * from "./errors";
export * from "./templates";
export * from "./schema";
export * from "./tools";
export * from "./mcp";
export * from "./transport";
export * from "./config";
export * from "./server";
export * from "./version";
export { appendLogLine, getLogPath, logError } from "./logging/server-log";
