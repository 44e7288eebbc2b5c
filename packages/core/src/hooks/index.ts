export * from "./hook.types";
export * from "./hook-registry";
export * from "./metadata-filter";
