/**
 * Reporters
 *
 * Implementations of the Reporter interface.
 */

import type { Example } from "../execution/example";
import type {
	DeprecationFields,
	ExampleReport,
	Reporter,
	ReportedGroup,
	ReporterEvent,
	RunSummary,
} from "./recording.types";

/**
 * Convert an example to its flat report form
 */
export function toExampleReport(example: Example): ExampleReport {
	const result = example.executionResult;
	return {
		description: example.description,
		fullDescription: example.fullDescription,
		location: example.location,
		status: result.status,
		runTime: result.runTime,
		pendingMessage: result.pendingMessage,
		exception: example.exception?.message,
		stackTrace: example.exception?.stack,
	};
}

/**
 * Render a deprecation notice as a single line
 */
export function formatDeprecation(fields: DeprecationFields): string {
	let text = fields.message ?? `${fields.deprecated ?? "This call"} is deprecated.`;
	if (fields.replacement) {
		text += ` Use ${fields.replacement} instead.`;
	}
	if (fields.callSite) {
		text += ` Called from ${fields.callSite}.`;
	}
	return text;
}

/**
 * Running tally of terminal events
 */
class Tally implements RunSummary {
	passed = 0;
	failed = 0;
	pending = 0;

	get total(): number {
		return this.passed + this.failed + this.pending;
	}
}

/**
 * Console Reporter
 *
 * Outputs example results to console with formatting.
 */
export class ConsoleReporter implements Reporter {
	readonly name = "console";
	private verbose: boolean;
	private tally = new Tally();
	private deprecations: DeprecationFields[] = [];

	constructor(options?: { verbose?: boolean }) {
		this.verbose = options?.verbose ?? false;
	}

	start(exampleCount: number): void {
		console.log(`\n${"=".repeat(60)}`);
		console.log(`🧪 Running ${exampleCount} example(s)`);
		console.log(`${"=".repeat(60)}\n`);
	}

	groupStarted(group: ReportedGroup): void {
		if (this.verbose) {
			console.log(`  📋 ${group.metadata.fullDescription}`);
		}
	}

	exampleStarted(example: Example): void {
		if (this.verbose) {
			console.log(`    ▶ ${example.description}`);
		}
	}

	examplePassed(example: Example): void {
		this.tally.passed++;
		console.log(`✅ ${example.fullDescription} (${example.executionResult.runTime ?? 0}ms)`);
	}

	exampleFailed(example: Example): void {
		this.tally.failed++;
		console.log(`❌ ${example.fullDescription} - FAILED (${example.executionResult.runTime ?? 0}ms)`);
		if (example.exception) {
			console.log(`   Error: ${example.exception.message}`);
		}
	}

	examplePending(example: Example): void {
		this.tally.pending++;
		console.log(`⏸️  ${example.fullDescription} - PENDING: ${example.executionResult.pendingMessage ?? ""}`);
	}

	message(message: string): void {
		console.log(message);
	}

	deprecation(fields: DeprecationFields): void {
		this.deprecations.push(fields);
	}

	close(): void {
		console.log(`\n${"-".repeat(60)}`);
		console.log("📊 Summary");
		console.log("-".repeat(60));

		console.log(`Total:    ${this.tally.total} example(s)`);
		console.log(`Passed:   ${this.tally.passed}`);
		console.log(`Failed:   ${this.tally.failed}`);
		console.log(`Pending:  ${this.tally.pending}`);

		if (this.deprecations.length > 0) {
			console.log("\nDeprecation Warnings:");
			for (const fields of this.deprecations) {
				console.log(`  ${formatDeprecation(fields)}`);
			}
		}

		console.log("-".repeat(60));

		if (this.tally.failed === 0) {
			console.log("\n✅ All examples passed!\n");
		} else {
			console.log("\n❌ Some examples failed.\n");
		}
	}
}

/**
 * JSON Reporter
 *
 * Collects example results and outputs them as JSON on close.
 */
export class JsonReporter implements Reporter {
	readonly name = "json";
	private output: string[] = [];
	private examples: ExampleReport[] = [];
	private messages: string[] = [];
	private deprecations: DeprecationFields[] = [];
	private tally = new Tally();
	private prettyPrint: boolean;

	constructor(options?: { prettyPrint?: boolean }) {
		this.prettyPrint = options?.prettyPrint ?? true;
	}

	exampleStarted(_example: Example): void {}

	examplePassed(example: Example): void {
		this.tally.passed++;
		this.examples.push(toExampleReport(example));
	}

	exampleFailed(example: Example): void {
		this.tally.failed++;
		this.examples.push(toExampleReport(example));
	}

	examplePending(example: Example): void {
		this.tally.pending++;
		this.examples.push(toExampleReport(example));
	}

	message(message: string): void {
		this.messages.push(message);
	}

	deprecation(fields: DeprecationFields): void {
		this.deprecations.push(fields);
	}

	close(): void {
		const document = {
			examples: this.examples,
			messages: this.messages,
			deprecations: this.deprecations,
			summary: {
				total: this.tally.total,
				passed: this.tally.passed,
				failed: this.tally.failed,
				pending: this.tally.pending,
			},
		};
		const json = this.prettyPrint ? JSON.stringify(document, null, 2) : JSON.stringify(document);
		this.output.push(json);
		console.log(json);
	}

	/**
	 * Get the JSON output
	 */
	getOutput(): string {
		return this.output.join("\n");
	}
}

/**
 * Recording Reporter
 *
 * Does not output anything; keeps every event for inspection (useful for testing).
 */
export class RecordingReporter implements Reporter {
	readonly name = "recording";
	readonly events: ReporterEvent[] = [];
	readonly messages: string[] = [];
	readonly deprecations: DeprecationFields[] = [];

	start(_exampleCount: number): void {
		this.events.push({ type: "start" });
	}

	groupStarted(group: ReportedGroup): void {
		this.events.push({ type: "groupStarted", group });
	}

	exampleStarted(example: Example): void {
		this.events.push({ type: "exampleStarted", example });
	}

	examplePassed(example: Example): void {
		this.events.push({ type: "examplePassed", example });
	}

	exampleFailed(example: Example): void {
		this.events.push({ type: "exampleFailed", example });
	}

	examplePending(example: Example): void {
		this.events.push({ type: "examplePending", example });
	}

	groupFinished(group: ReportedGroup): void {
		this.events.push({ type: "groupFinished", group });
	}

	message(message: string): void {
		this.messages.push(message);
	}

	deprecation(fields: DeprecationFields): void {
		this.deprecations.push(fields);
	}

	close(): void {
		this.events.push({ type: "close" });
	}

	/**
	 * Event types in the order they were received
	 */
	eventTypes(): string[] {
		return this.events.map((event) => event.type);
	}

	/**
	 * Examples that received the given terminal event
	 */
	examplesWith(type: "examplePassed" | "exampleFailed" | "examplePending"): Example[] {
		return this.events
			.filter((event) => event.type === type)
			.flatMap((event) => (event.example ? [event.example] : []));
	}
}

/**
 * Composite Reporter
 *
 * Combines multiple reporters.
 */
export class CompositeReporter implements Reporter {
	readonly name = "composite";
	private reporters: Reporter[];

	constructor(reporters: Reporter[]) {
		this.reporters = reporters;
	}

	start(exampleCount: number): void {
		for (const reporter of this.reporters) {
			reporter.start?.(exampleCount);
		}
	}

	groupStarted(group: ReportedGroup): void {
		for (const reporter of this.reporters) {
			reporter.groupStarted?.(group);
		}
	}

	exampleStarted(example: Example): void {
		for (const reporter of this.reporters) {
			reporter.exampleStarted(example);
		}
	}

	examplePassed(example: Example): void {
		for (const reporter of this.reporters) {
			reporter.examplePassed(example);
		}
	}

	exampleFailed(example: Example): void {
		for (const reporter of this.reporters) {
			reporter.exampleFailed(example);
		}
	}

	examplePending(example: Example): void {
		for (const reporter of this.reporters) {
			reporter.examplePending(example);
		}
	}

	groupFinished(group: ReportedGroup): void {
		for (const reporter of this.reporters) {
			reporter.groupFinished?.(group);
		}
	}

	message(message: string): void {
		for (const reporter of this.reporters) {
			reporter.message(message);
		}
	}

	deprecation(fields: DeprecationFields): void {
		for (const reporter of this.reporters) {
			reporter.deprecation(fields);
		}
	}

	close(): void {
		for (const reporter of this.reporters) {
			reporter.close?.();
		}
	}

	/**
	 * Add a reporter
	 */
	addReporter(reporter: Reporter): void {
		this.reporters.push(reporter);
	}

	/**
	 * Remove a reporter by name
	 */
	removeReporter(name: string): void {
		this.reporters = this.reporters.filter((r) => r.name !== name);
	}
}
