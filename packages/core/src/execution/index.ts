/**
 * Execution Module
 *
 * Example lifecycle, example groups, pending/skip handling and the around-hook handle.
 */

export * from "./current-example";
export * from "./errors";
export * from "./example";
export * from "./example-group";
export * from "./execution-result";
export * from "./execution.types";
export * from "./group-instance";
export * from "./pending";
export * from "./procsy";
export * from "./runner";
