export * from "./formatters";
export * from "./template";
