export * from "./types/json";
export * from "./types/schema";
export * from "./types/tool";
export * from "./types/transport";
export * from "./types/server";
