export * from "./types";
export * from "./registry";
export * from "./executors";
export * from "./adapters/deadline";
export * from "./adapters/executor-base";
export * from "./adapters/http-tool";
export * from "./adapters/command-tool";
