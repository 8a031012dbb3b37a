export * from "./stdio";
export * from "./sse";
