export * from "./validator";
