export * from "./context";
export * from "./dispatcher";
export * from "./connection";
