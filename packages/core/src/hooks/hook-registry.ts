/**
 * Hook Registry
 *
 * Stores before/after/around hooks of one example group and runs the ones
 * that apply to an example.
 *
 * Each group owns a registry whose parent is the enclosing group's registry:
 * - before and around hooks run outermost group first, in declaration order
 * - after hooks run innermost group first, in reverse declaration order
 */

import { AFTER_EACH_CONTEXT, type Example } from "../execution/example";
import type { ExampleState } from "../execution/execution.types";
import { toError } from "../execution/errors";
import { isSkipSignal } from "../execution/pending";
import type { Procsy } from "../execution/procsy";
import { generateId } from "../utils";
import type {
	AroundHook,
	EachHook,
	GroupHook,
	HookCollection,
	HookPhase,
	MetadataFilter,
	RegisteredHook,
} from "./hook.types";
import { matchFilter } from "./metadata-filter";

export class HookRegistry implements HookCollection {
	private beforeEachHooks: RegisteredHook<EachHook>[] = [];
	private afterEachHooks: RegisteredHook<EachHook>[] = [];
	private aroundEachHooks: RegisteredHook<AroundHook>[] = [];
	private beforeAllHooks: RegisteredHook<GroupHook>[] = [];
	private afterAllHooks: RegisteredHook<GroupHook>[] = [];

	constructor(private readonly parent?: HookRegistry) {}

	// =========================================================================
	// Registration
	// =========================================================================

	/**
	 * Register a hook run before each matching example
	 */
	before(fn: EachHook, filter?: MetadataFilter): string {
		return this.add(this.beforeEachHooks, fn, filter);
	}

	/**
	 * Register a hook run after each matching example, even when it failed
	 */
	after(fn: EachHook, filter?: MetadataFilter): string {
		return this.add(this.afterEachHooks, fn, filter);
	}

	/**
	 * Register a hook wrapped around each matching example
	 */
	around(fn: AroundHook, filter?: MetadataFilter): string {
		return this.add(this.aroundEachHooks, fn, filter);
	}

	beforeAll(fn: GroupHook): string {
		return this.add(this.beforeAllHooks, fn);
	}

	afterAll(fn: GroupHook): string {
		return this.add(this.afterAllHooks, fn);
	}

	/**
	 * Unregister a hook by ID
	 */
	unregister(id: string): boolean {
		const lists = [
			this.beforeEachHooks,
			this.afterEachHooks,
			this.aroundEachHooks,
			this.beforeAllHooks,
			this.afterAllHooks,
		];
		for (const list of lists) {
			const index = list.findIndex((hook) => hook.id === id);
			if (index !== -1) {
				list.splice(index, 1);
				return true;
			}
		}
		return false;
	}

	/**
	 * Clear all hooks of this registry (the parent's are kept)
	 */
	clear(): void {
		this.beforeEachHooks = [];
		this.afterEachHooks = [];
		this.aroundEachHooks = [];
		this.beforeAllHooks = [];
		this.afterAllHooks = [];
	}

	private add<F>(list: RegisteredHook<F>[], fn: F, filter?: MetadataFilter): string {
		const id = generateId("hook_");
		list.push({ id, fn, filter });
		return id;
	}

	// =========================================================================
	// Lookup
	// =========================================================================

	beforeHooksFor(example: Example): RegisteredHook<EachHook>[] {
		const inherited = this.parent?.beforeHooksFor(example) ?? [];
		return [...inherited, ...this.beforeEachHooks.filter((hook) => matchFilter(hook.filter, example.metadata))];
	}

	afterHooksFor(example: Example): RegisteredHook<EachHook>[] {
		const own = this.afterEachHooks.filter((hook) => matchFilter(hook.filter, example.metadata)).reverse();
		return [...own, ...(this.parent?.afterHooksFor(example) ?? [])];
	}

	aroundHooksFor(example: Example): RegisteredHook<AroundHook>[] {
		const inherited = this.parent?.aroundHooksFor(example) ?? [];
		return [...inherited, ...this.aroundEachHooks.filter((hook) => matchFilter(hook.filter, example.metadata))];
	}

	// =========================================================================
	// Execution
	// =========================================================================

	/**
	 * Run the hooks of a phase for one example.
	 *
	 * - before: stops at the first failure or skip (thrown)
	 * - after: every hook runs; failures are captured on the example, a skip only marks it
	 * - around: layers the hooks around `procsy`, first registered outermost
	 */
	async run(phase: HookPhase, _scope: "each", example: Example, procsy?: Procsy): Promise<void> {
		switch (phase) {
			case "before":
				return this.runBefore(example);
			case "after":
				return this.runAfter(example);
			case "around":
				if (!procsy) {
					throw new Error("around hooks need the wrapped example pipeline");
				}
				return this.runAround(example, procsy);
		}
	}

	/**
	 * Run beforeAll or afterAll hooks of this group.
	 *
	 * beforeAll stops at the first failure; afterAll runs every hook.
	 * Returns the failures.
	 */
	async runAll(phase: "before" | "after", state: ExampleState): Promise<Error[]> {
		const hooks = phase === "before" ? this.beforeAllHooks : [...this.afterAllHooks].reverse();
		const failures: Error[] = [];

		for (const hook of hooks) {
			try {
				await hook.fn(state);
			} catch (error) {
				failures.push(toError(error));
				if (phase === "before") {
					break;
				}
			}
		}

		return failures;
	}

	private async runBefore(example: Example): Promise<void> {
		for (const hook of this.beforeHooksFor(example)) {
			await hook.fn(example.context);
		}
	}

	private async runAfter(example: Example): Promise<void> {
		for (const hook of this.afterHooksFor(example)) {
			try {
				await hook.fn(example.context);
			} catch (error) {
				if (isSkipSignal(error)) {
					continue;
				}
				example.captureFailure(toError(error), AFTER_EACH_CONTEXT);
			}
		}
	}

	private async runAround(example: Example, procsy: Procsy): Promise<void> {
		const context = example.context;
		const composed = this.aroundHooksFor(example)
			.reverse()
			.reduce(
				(inner, hook) =>
					inner.wrap(async () => {
						await hook.fn(inner, context);
					}),
				procsy,
			);

		await composed.run();
	}
}
