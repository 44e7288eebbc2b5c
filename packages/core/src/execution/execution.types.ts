/**
 * Execution Types
 *
 * Types shared by examples, example groups and hooks.
 */

import type { HookCollection } from "../hooks/hook.types";
import type { GroupMetadata } from "../metadata";
import type { PendingExampleFixedError } from "./errors";
import type { Example } from "./example";

// =============================================================================
// Example Context
// =============================================================================

/**
 * Per-run local state shared between hooks and the body.
 * Wiped at the end of every run.
 */
export type ExampleState = Record<string, unknown>;

/**
 * Everything a hook or an example body may touch during a run
 */
export interface ExampleContext {
	/** The running example */
	readonly example: Example;
	/** Local state for this run */
	readonly state: ExampleState;
	/** Mark the example pending; the body keeps running and is expected to fail */
	pending(reason?: string): void;
	/** Mark the example skipped and stop it here; nothing after the call runs */
	skip(reason?: string): never;
}

/**
 * Example body
 */
export type ExampleBody = (context: ExampleContext) => void | Promise<void>;

// =============================================================================
// Group Instance
// =============================================================================

/**
 * Lifecycle of a mocking library, driven once per example
 */
export interface MockLifecycle {
	setupMocks(): void | Promise<void>;
	/** Throws when an expectation was not met */
	verifyMocks(): void | Promise<void>;
	teardownMocks(): void | Promise<void>;
}

/**
 * Execution context an example runs in. One instance per example run.
 */
export interface ExampleGroupInstance extends MockLifecycle {
	readonly state: ExampleState;
	/** Remove every piece of local state */
	clearState(): void;
}

/**
 * What an example needs from the group that declares it
 */
export interface ExampleGroupLike {
	readonly metadata: GroupMetadata;
	readonly hooks: HookCollection;
}

// =============================================================================
// Pipeline Outcome
// =============================================================================

/**
 * Result of the guarded before/body section of the pipeline
 */
export type Outcome =
	| { kind: "ok" }
	| { kind: "failed"; error: Error }
	| { kind: "skipped" }
	| { kind: "pendingFixed"; error: PendingExampleFixedError };
