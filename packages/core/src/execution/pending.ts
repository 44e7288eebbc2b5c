/**
 * Pending Policy
 *
 * Records pending/skip state on example metadata.
 *
 * - pending: the body still runs and is expected to fail. A failure is kept
 *   as `pendingException`; a success is itself reported as a failure.
 * - skip: nothing runs, the example is reported as pending.
 */

import type { ExampleMetadata, PendingDirective } from "../metadata";
import { PendingExampleFixedError } from "./errors";

export const NO_REASON_GIVEN = "No reason given";

export const NOT_YET_IMPLEMENTED = "Not yet implemented";

export const PENDING_FIXED_MESSAGE = "Expected example to fail since it is pending, but it passed.";

/**
 * Signal thrown by `context.skip()`. The pipeline stops and the example
 * is reported as pending.
 */
export class SkipDeclaredInExample {
	constructor(public readonly reason: string) {}
}

export function isSkipSignal(value: unknown): value is SkipDeclaredInExample {
	return value instanceof SkipDeclaredInExample;
}

/**
 * A directive is in force unless absent or `false`; `""` means no reason given
 */
export function isActiveDirective(directive: PendingDirective | undefined): boolean {
	return directive !== undefined && directive !== false;
}

/**
 * Message recorded for a pending/skip directive
 */
export function pendingMessageFor(directive: PendingDirective | undefined): string {
	return typeof directive === "string" && directive.length > 0 ? directive : NO_REASON_GIVEN;
}

/**
 * Mark the example pending and record the reason
 */
export function markPending(metadata: ExampleMetadata, directive: PendingDirective | undefined): void {
	metadata.pending = true;
	metadata.executionResult.pendingMessage = pendingMessageFor(directive);
	metadata.executionResult.pendingFixed = false;
}

/**
 * Mark the example skipped from inside a hook or the body and stop it
 */
export function markSkipped(metadata: ExampleMetadata, directive: PendingDirective | undefined): never {
	markPending(metadata, directive);
	metadata.skip = directive ?? true;
	throw new SkipDeclaredInExample(pendingMessageFor(directive));
}

/**
 * Record that a pending example passed and build the error reporting it
 */
export function markFixed(metadata: ExampleMetadata): PendingExampleFixedError {
	metadata.pending = false;
	metadata.executionResult.pendingFixed = true;
	return new PendingExampleFixedError(PENDING_FIXED_MESSAGE, metadata.location);
}
