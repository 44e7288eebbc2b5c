/**
 * Execution Errors
 */

/**
 * Raised when an example is driven through an invalid lifecycle transition
 * (e.g. run twice, or its context read outside of a run).
 */
export class ExampleStateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ExampleStateError";
	}
}

/**
 * Raised when an example declared as pending completes without failing.
 *
 * The stack points at the example declaration rather than at framework code.
 */
export class PendingExampleFixedError extends Error {
	constructor(
		message: string,
		public readonly location: string,
	) {
		super(message);
		this.name = "PendingExampleFixedError";
		this.stack = `${this.name}: ${message}\n    at ${location}`;
	}
}

/**
 * Normalize any thrown value to an Error
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/**
 * First frame of an error's stack trace, without the leading "at "
 */
export function firstBacktraceFrame(error: Error): string | undefined {
	const frame = error.stack
		?.split("\n")
		.map((line) => line.trim())
		.find((line) => line.startsWith("at "));
	return frame?.slice(3);
}
