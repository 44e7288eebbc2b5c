/**
 * Reporter Types
 *
 * Contract between the execution engine and reporters.
 */

import type { Example } from "../execution/example";
import type { GroupMetadata } from "../metadata";

/**
 * Fields of a deprecation notice
 */
export interface DeprecationFields {
	/** What is deprecated */
	deprecated?: string;
	/** What to use instead */
	replacement?: string;
	/** Free-form notice (used instead of deprecated/replacement) */
	message?: string;
	/** "path:line" of the caller that triggered the notice */
	callSite?: string;
	[key: string]: unknown;
}

/**
 * Group information passed to reporters
 */
export interface ReportedGroup {
	readonly metadata: GroupMetadata;
	readonly examples: readonly Example[];
}

/**
 * Reporter Interface
 */
export interface Reporter {
	/** Reporter name */
	readonly name: string;

	/** Called once before any group runs */
	start?(exampleCount: number): void;

	/** Called when a group starts running */
	groupStarted?(group: ReportedGroup): void;

	/** Called when an example starts */
	exampleStarted(example: Example): void;

	/** Called when an example finishes with status "passed" */
	examplePassed(example: Example): void;

	/** Called when an example finishes with status "failed" */
	exampleFailed(example: Example): void;

	/** Called when an example finishes with status "pending" */
	examplePending(example: Example): void;

	/** Called when a group and all its children finished */
	groupFinished?(group: ReportedGroup): void;

	/** Free-form diagnostic text */
	message(message: string): void;

	/** Deprecation notice */
	deprecation(fields: DeprecationFields): void;

	/** Called once after every group ran */
	close?(): void;
}

/**
 * Reporter event kinds (as recorded by RecordingReporter)
 */
export type ReporterEventType =
	| "start"
	| "groupStarted"
	| "exampleStarted"
	| "examplePassed"
	| "exampleFailed"
	| "examplePending"
	| "groupFinished"
	| "close";

/**
 * Recorded reporter event
 */
export interface ReporterEvent {
	type: ReporterEventType;
	example?: Example;
	group?: ReportedGroup;
}

/**
 * Flattened example result (for JSON output)
 */
export interface ExampleReport {
	description: string;
	fullDescription: string;
	location: string;
	status: string;
	runTime?: number;
	pendingMessage?: string;
	exception?: string;
	stackTrace?: string;
}

/**
 * Run totals
 */
export interface RunSummary {
	total: number;
	passed: number;
	failed: number;
	pending: number;
}
