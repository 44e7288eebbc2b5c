/**
 * Example
 *
 * One declared test and the orchestration of its run:
 *
 *   start
 *   -> skipped?  record pending, run nothing
 *   -> dry run?  run nothing
 *   -> around hooks ( setup mocks, before hooks, body, pending-fixed check,
 *                     after hooks, verify mocks, teardown mocks )
 *   -> clear group instance state, assign generated description
 *   -> finish: failed | pending | passed
 *
 * Every failure funnels through captureFailure(): the first one becomes the
 * example's exception, later ones are only written to the reporter.
 */

import { systemClock, type Clock } from "../clock";
import { getConfiguration, type Configuration } from "../config/configuration";
import type { AroundHook, RegisteredHook } from "../hooks/hook.types";
import type { ExampleMetadata, MetadataInput, PendingDirective } from "../metadata";
import type { ExecutionResult } from "./execution-result";
import type { Reporter } from "../recording/recording.types";
import { setCurrentExample } from "./current-example";
import { ExampleStateError, firstBacktraceFrame, toError } from "./errors";
import type {
	ExampleBody,
	ExampleContext,
	ExampleGroupInstance,
	ExampleGroupLike,
	Outcome,
} from "./execution.types";
import { isActiveDirective, isSkipSignal, markFixed, markPending, markSkipped, NOT_YET_IMPLEMENTED } from "./pending";
import { Procsy, type ProcsyBody } from "./procsy";

/**
 * Context marker: capture the failure without printing a collision message
 */
export const SILENT: unique symbol = Symbol("silent");

/**
 * Where a failure happened, or SILENT
 */
export type FailureContext = string | typeof SILENT;

export const AROUND_EACH_CONTEXT = "in an around(:each) hook";
export const AFTER_EACH_CONTEXT = "in an after(:each) hook";
export const DESCRIPTION_CONTEXT = "while assigning the example description";

/**
 * Example options
 */
export interface ExampleOptions {
	/** Time source (default: system clock) */
	clock?: Clock;
	/** Configuration (default: the process-wide one, read at run time) */
	configuration?: Configuration;
}

/**
 * Diagnostic written when a failure is discarded because one was already captured
 */
export function formatFailureCollision(exception: Error, context?: string): string {
	const where = context ? ` ${context}` : "";
	return [
		"",
		`An error occurred${where}`,
		`  ${exception.name}: ${exception.message}`,
		`  occurred at ${firstBacktraceFrame(exception) ?? "unknown location"}`,
		"",
		"",
	].join("\n");
}

export class Example {
	readonly group: ExampleGroupLike;
	readonly metadata: ExampleMetadata;
	clock: Clock;

	private readonly body?: ExampleBody;
	private readonly configurationOverride?: Configuration;
	private _exception?: Error;
	private groupInstance?: ExampleGroupInstance;
	private runContext?: ExampleContext;
	private activeReporter?: Reporter;

	constructor(
		group: ExampleGroupLike,
		description: string | undefined,
		metadata: MetadataInput = {},
		body?: ExampleBody,
		options: ExampleOptions = {},
	) {
		this.group = group;
		this.body = body;
		this.metadata = group.metadata.forExample(description, body ? metadata : { ...metadata, skip: NOT_YET_IMPLEMENTED });
		this.clock = options.clock ?? systemClock;
		this.configurationOverride = options.configuration;
	}

	// =========================================================================
	// Accessors
	// =========================================================================

	get configuration(): Configuration {
		return this.configurationOverride ?? getConfiguration();
	}

	/**
	 * The declared description, or "example at <location>" when there is none
	 */
	get description(): string {
		const description = this.metadata.description;
		return this.configuration.formatDescription(description === "" ? `example at ${this.location}` : description);
	}

	/**
	 * Where the example was declared
	 */
	get sourceLocation(): string {
		return this.metadata.location;
	}

	/**
	 * First failure captured while running this example
	 */
	get exception(): Error | undefined {
		return this._exception;
	}

	get executionResult(): ExecutionResult {
		return this.metadata.executionResult;
	}

	get filePath(): string {
		return this.metadata.filePath;
	}

	get fullDescription(): string {
		return this.metadata.fullDescription;
	}

	get location(): string {
		return this.metadata.location;
	}

	get pending(): PendingDirective | undefined {
		return this.metadata.pending;
	}

	get skip(): PendingDirective | undefined {
		return this.metadata.skip;
	}

	isPending(): boolean {
		return isActiveDirective(this.metadata.pending);
	}

	isSkipped(): boolean {
		return isActiveDirective(this.metadata.skip);
	}

	/**
	 * Context handed to hooks and the body. Only available during run().
	 */
	get context(): ExampleContext {
		if (!this.runContext) {
			throw new ExampleStateError(`Example "${this.description}" is not running`);
		}
		return this.runContext;
	}

	aroundEachHooks(): ReadonlyArray<RegisteredHook<AroundHook>> {
		return this.group.hooks.aroundHooksFor(this);
	}

	// =========================================================================
	// Running
	// =========================================================================

	/**
	 * Run the example in the given group instance.
	 *
	 * @returns false when the example failed, true when it passed or is pending
	 */
	async run(groupInstance: ExampleGroupInstance, reporter: Reporter): Promise<boolean> {
		if (this.executionResult.status !== "notStarted") {
			throw new ExampleStateError(`Example "${this.description}" has already been run`);
		}

		this.groupInstance = groupInstance;
		this.runContext = this.createContext(groupInstance);
		setCurrentExample(this);

		try {
			this.start(reporter);

			try {
				if (this.isSkipped()) {
					markPending(this.metadata, this.metadata.skip);
				} else if (!this.configuration.dryRun) {
					if (this.isPending()) {
						markPending(this.metadata, this.metadata.pending);
					}
					await this.withAroundEachHooks(() => this.runPipeline());
				}
			} catch (error) {
				this.captureFailure(toError(error));
			} finally {
				groupInstance.clearState();
				this.groupInstance = undefined;
				this.runContext = undefined;

				try {
					this.assignGeneratedDescription();
				} catch (error) {
					this.captureFailure(toError(error), DESCRIPTION_CONTEXT);
				}
			}

			return this.finish(reporter);
		} finally {
			setCurrentExample(undefined);
		}
	}

	/**
	 * Fail the example without running hooks or the body
	 * (used when a beforeAll hook of its group failed)
	 */
	failWithException(reporter: Reporter, exception: Error): boolean {
		this.start(reporter);
		this.captureFailure(exception);
		return this.finish(reporter);
	}

	/**
	 * Capture a failure. The first one wins; later ones are written to the
	 * reporter (unless context is SILENT) and otherwise dropped.
	 */
	captureFailure(exception: Error, context?: FailureContext): void {
		if (this._exception && context !== SILENT) {
			this.messageReporter().message(formatFailureCollision(exception, context));
		}

		if (!this._exception) {
			this._exception = exception;
		}
	}

	// =========================================================================
	// Pipeline
	// =========================================================================

	private async withAroundEachHooks(pipeline: ProcsyBody): Promise<void> {
		try {
			if (this.aroundEachHooks().length === 0) {
				await pipeline();
			} else {
				await this.group.hooks.run("around", "each", this, new Procsy(this.metadata, pipeline));
			}
		} catch (error) {
			if (isSkipSignal(error)) {
				return;
			}
			this.captureFailure(toError(error), AROUND_EACH_CONTEXT);
		}
	}

	private async runPipeline(): Promise<void> {
		try {
			this.settle(await this.runGuardedBody());
		} finally {
			await this.runAfterEach();
		}
	}

	/**
	 * Setup mocks, before hooks and the body, reduced to an Outcome
	 */
	private async runGuardedBody(): Promise<Outcome> {
		try {
			const instance = this.requireGroupInstance();
			await instance.setupMocks();

			await this.group.hooks.run("before", "each", this);
			if (this.body) {
				await this.body(this.context);
			}

			if (this.isPending()) {
				return { kind: "pendingFixed", error: markFixed(this.metadata) };
			}

			return { kind: "ok" };
		} catch (error) {
			if (isSkipSignal(error)) {
				return { kind: "skipped" };
			}
			return { kind: "failed", error: toError(error) };
		}
	}

	private settle(outcome: Outcome): void {
		switch (outcome.kind) {
			case "ok":
			case "skipped":
				return;
			case "pendingFixed":
				this.captureFailure(outcome.error);
				return;
			case "failed":
				if (this.isPending()) {
					this.executionResult.pendingException = outcome.error;
				} else {
					this.captureFailure(outcome.error);
				}
				return;
		}
	}

	private async runAfterEach(): Promise<void> {
		const instance = this.requireGroupInstance();

		try {
			await this.group.hooks.run("after", "each", this);
			await this.verifyMocks(instance);
		} catch (error) {
			this.captureFailure(toError(error), AFTER_EACH_CONTEXT);
		} finally {
			await instance.teardownMocks();
		}
	}

	/**
	 * A verification failure of an example that already has a pending
	 * message keeps it pending instead of failing it.
	 */
	private async verifyMocks(instance: ExampleGroupInstance): Promise<void> {
		try {
			await instance.verifyMocks();
		} catch (error) {
			if (this.executionResult.pendingMessage !== undefined) {
				this.executionResult.pendingFixed = false;
				this.metadata.pending = true;
				this._exception = undefined;
			} else {
				this.captureFailure(toError(error), SILENT);
			}
		}
	}

	private assignGeneratedDescription(): void {
		const { expectingMatcherDescriptions, descriptions } = this.configuration;
		if (!expectingMatcherDescriptions) {
			return;
		}

		if (this.metadata.descriptionArgs.length === 0) {
			const generated = descriptions.generatedDescription();
			if (generated !== undefined) {
				this.metadata.descriptionArgs.push(generated);
			}
		}

		descriptions.clear();
	}

	// =========================================================================
	// Lifecycle Notifications
	// =========================================================================

	private start(reporter: Reporter): void {
		this.activeReporter = reporter;
		reporter.exampleStarted(this);
		this.executionResult.start(this.clock.now());
	}

	private finish(reporter: Reporter): boolean {
		const finishedAt = this.clock.now();

		if (this._exception) {
			this.executionResult.finish("failed", finishedAt, this._exception);
			reporter.exampleFailed(this);
			return false;
		}

		if (this.executionResult.pendingMessage !== undefined) {
			this.executionResult.finish("pending", finishedAt);
			reporter.examplePending(this);
			return true;
		}

		this.executionResult.finish("passed", finishedAt);
		reporter.examplePassed(this);
		return true;
	}

	// =========================================================================
	// Helpers
	// =========================================================================

	private createContext(groupInstance: ExampleGroupInstance): ExampleContext {
		return {
			example: this,
			state: groupInstance.state,
			pending: (reason?: string) => markPending(this.metadata, reason),
			skip: (reason?: string) => markSkipped(this.metadata, reason),
		};
	}

	private requireGroupInstance(): ExampleGroupInstance {
		if (!this.groupInstance) {
			throw new ExampleStateError(`Example "${this.description}" has no group instance`);
		}
		return this.groupInstance;
	}

	private messageReporter(): Reporter {
		return this.activeReporter ?? this.configuration.reporter;
	}
}
