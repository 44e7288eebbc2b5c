/**
 * Recording Module
 *
 * Reporter contract and built-in reporters.
 */

export * from "./recording.types";
export * from "./reporter";
