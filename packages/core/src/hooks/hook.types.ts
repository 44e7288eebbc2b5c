/**
 * Hook Types
 */

import type { Example } from "../execution/example";
import type { ExampleContext, ExampleState } from "../execution/execution.types";
import type { Procsy } from "../execution/procsy";

/**
 * Hook phase
 */
export type HookPhase = "before" | "after" | "around";

/**
 * Hook scope: once per example, or once per group
 */
export type HookScope = "each" | "all";

/**
 * before/after hook, run once per example
 */
export type EachHook = (context: ExampleContext) => void | Promise<void>;

/**
 * around hook, receives the wrapped pipeline
 */
export type AroundHook = (example: Procsy, context: ExampleContext) => void | Promise<void>;

/**
 * beforeAll/afterAll hook, run once per group with the group-level state
 */
export type GroupHook = (state: ExampleState) => void | Promise<void>;

/**
 * Metadata condition: a literal compared to the tag, or a predicate.
 * `true` matches any truthy tag value.
 */
export type MetadataCondition = unknown | ((value: unknown) => boolean);

/**
 * Every key must apply for the hook to run for an example
 */
export type MetadataFilter = Record<string, MetadataCondition>;

/**
 * Registered hook
 */
export interface RegisteredHook<F> {
	id: string;
	fn: F;
	filter?: MetadataFilter;
}

/**
 * What an example needs from a hook store
 */
export interface HookCollection {
	run(phase: HookPhase, scope: "each", example: Example, procsy?: Procsy): Promise<void>;
	aroundHooksFor(example: Example): ReadonlyArray<RegisteredHook<AroundHook>>;
}
