/**
 * ExampleGroup Class
 *
 * Declares examples and hooks, and runs them: beforeAll hooks, each example
 * in a fresh group instance, nested groups, then afterAll hooks.
 */

import type { Clock } from "../clock";
import { getConfiguration, type Configuration } from "../config/configuration";
import { HookRegistry } from "../hooks/hook-registry";
import type { AroundHook, EachHook, GroupHook, MetadataFilter } from "../hooks/hook.types";
import { GroupMetadata, type MetadataInput } from "../metadata";
import type { Reporter, ReportedGroup } from "../recording/recording.types";
import { firstNonFrameworkFrame } from "../warnings/call-site";
import { Example, formatFailureCollision } from "./example";
import type { ExampleBody, ExampleGroupLike, ExampleState } from "./execution.types";
import { GroupInstance } from "./group-instance";

export const XIT_MESSAGE = "Temporarily skipped with xit";
export const AFTER_ALL_CONTEXT = "in an after(:all) hook";

/**
 * Example group options
 */
export interface ExampleGroupOptions {
	metadata?: MetadataInput;
	/** Configuration for this group and its examples (default: process-wide) */
	configuration?: Configuration;
	/** Clock for this group's examples (default: system clock) */
	clock?: Clock;
}

export class ExampleGroup implements ExampleGroupLike, ReportedGroup {
	readonly metadata: GroupMetadata;
	readonly hooks: HookRegistry;
	readonly parent?: ExampleGroup;
	readonly examples: Example[] = [];
	readonly children: ExampleGroup[] = [];

	private readonly clock?: Clock;
	private readonly configurationOverride?: Configuration;

	constructor(description: string, options: ExampleGroupOptions = {}, parent?: ExampleGroup) {
		const input: MetadataInput = { location: firstNonFrameworkFrame(), ...options.metadata };

		this.parent = parent;
		this.metadata = parent ? parent.metadata.forGroup(description, input) : new GroupMetadata(description, input);
		this.hooks = new HookRegistry(parent?.hooks);
		this.clock = options.clock ?? parent?.clock;
		this.configurationOverride = options.configuration ?? parent?.configurationOverride;
	}

	get configuration(): Configuration {
		return this.configurationOverride ?? getConfiguration();
	}

	// =========================================================================
	// Declaration
	// =========================================================================

	/**
	 * Declare a nested group
	 */
	describe(description: string, define?: (group: ExampleGroup) => void, metadata?: MetadataInput): ExampleGroup {
		const child = new ExampleGroup(
			description,
			{ metadata, clock: this.clock, configuration: this.configurationOverride },
			this,
		);
		this.children.push(child);
		define?.(child);
		return child;
	}

	/**
	 * Declare an example. Without a body it is reported as not yet implemented.
	 */
	example(description: string | undefined, body?: ExampleBody, metadata: MetadataInput = {}): Example {
		const example = new Example(this, description, { location: firstNonFrameworkFrame(), ...metadata }, body, {
			clock: this.clock,
			configuration: this.configurationOverride,
		});
		this.examples.push(example);
		return example;
	}

	it(description: string | undefined, body?: ExampleBody, metadata: MetadataInput = {}): Example {
		return this.example(description, body, metadata);
	}

	/**
	 * Declare an example that is skipped
	 */
	xit(description: string | undefined, body?: ExampleBody, metadata: MetadataInput = {}): Example {
		return this.example(description, body, { ...metadata, skip: XIT_MESSAGE });
	}

	before(fn: EachHook, filter?: MetadataFilter): string {
		return this.hooks.before(fn, filter);
	}

	after(fn: EachHook, filter?: MetadataFilter): string {
		return this.hooks.after(fn, filter);
	}

	around(fn: AroundHook, filter?: MetadataFilter): string {
		return this.hooks.around(fn, filter);
	}

	beforeAll(fn: GroupHook): string {
		return this.hooks.beforeAll(fn);
	}

	afterAll(fn: GroupHook): string {
		return this.hooks.afterAll(fn);
	}

	/**
	 * Examples of this group and of every nested group
	 */
	descendantExamples(): Example[] {
		return [...this.examples, ...this.children.flatMap((child) => child.descendantExamples())];
	}

	// =========================================================================
	// Running
	// =========================================================================

	/**
	 * Run every example of this group and its nested groups.
	 *
	 * @param inheritedState - state produced by the enclosing groups' beforeAll hooks
	 * @returns true when no example failed
	 */
	async run(reporter: Reporter, inheritedState: ExampleState = {}): Promise<boolean> {
		const configuration = this.configuration;
		const state: ExampleState = { ...inheritedState };

		reporter.groupStarted?.(this);

		try {
			if (!configuration.dryRun) {
				const [failure] = await this.hooks.runAll("before", state);
				if (failure) {
					for (const example of this.descendantExamples()) {
						example.failWithException(reporter, failure);
					}
					return false;
				}
			}

			let passed = true;

			for (const example of this.examples) {
				const instance = new GroupInstance(configuration.mockFramework(), state);
				passed = (await example.run(instance, reporter)) && passed;
			}

			for (const child of this.children) {
				passed = (await child.run(reporter, state)) && passed;
			}

			return passed;
		} finally {
			if (!configuration.dryRun) {
				for (const failure of await this.hooks.runAll("after", state)) {
					reporter.message(formatFailureCollision(failure, AFTER_ALL_CONTEXT));
				}
			}
			reporter.groupFinished?.(this);
		}
	}
}

/**
 * Factory function for declaring a top-level example group
 *
 * @example
 * ```typescript
 * const group = describe("Calculator", (group) => {
 *   group.before(({ state }) => {
 *     state.calculator = new Calculator();
 *   });
 *
 *   group.it("adds", ({ state }) => {
 *     assert.equal(add(state.calculator, 1, 2), 3);
 *   });
 *
 *   group.it("divides by zero", () => {}, { pending: "needs a decision on Infinity" });
 * });
 *
 * await runGroups([group], { reporter: new ConsoleReporter() });
 * ```
 */
export function describe(
	description: string,
	define?: (group: ExampleGroup) => void,
	options: ExampleGroupOptions = {},
): ExampleGroup {
	const group = new ExampleGroup(description, options);
	define?.(group);
	return group;
}
