export * from "./metadata.types";
export * from "./metadata";
