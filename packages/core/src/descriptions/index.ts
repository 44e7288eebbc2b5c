export * from "./generated-descriptions";
