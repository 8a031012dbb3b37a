export * from "./address";
export * from "./duration";
export * from "./load-config";
