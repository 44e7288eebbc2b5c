/**
 * ExampleGroup Tests
 *
 * Declaration, group hooks and group runs.
 */

import {
	AFTER_ALL_CONTEXT,
	Configuration,
	configure,
	describe as describeGroup,
	ExampleGroup,
	FakeClock,
	formatFailureCollision,
	RecordingReporter,
	resetConfiguration,
	runGroups,
	XIT_MESSAGE,
} from "trialrun";
import { beforeEach, describe, expect, it } from "vitest";
import { createLoggingMocks } from "../helpers/test-helpers";

describe("ExampleGroup", () => {
	let clock: FakeClock;
	let reporter: RecordingReporter;

	beforeEach(() => {
		resetConfiguration();
		clock = new FakeClock();
		reporter = new RecordingReporter();
	});

	describe("declaration", () => {
		it("should build nested groups through describe()", () => {
			const group = describeGroup(
				"Cart",
				(cart) => {
					cart.it("starts empty", () => {});
					cart.describe("checkout", (checkout) => {
						checkout.it("charges the card", () => {});
					});
				},
				{ clock },
			);

			expect(group.examples.map((example) => example.description)).toEqual(["starts empty"]);
			expect(group.children).toHaveLength(1);
			expect(group.children[0].parent).toBe(group);
			expect(group.descendantExamples().map((example) => example.fullDescription)).toEqual([
				"Cart starts empty",
				"Cart checkout charges the card",
			]);
		});

		it("should pass tags down to nested groups and examples", () => {
			const group = new ExampleGroup("Billing", { metadata: { epic: "Payments", severity: "minor" } });
			const child = group.describe("refunds", undefined, { severity: "critical" });
			const example = child.it("refunds in full", () => {}, { story: "full refund" });

			expect(example.metadata.tags).toEqual({ epic: "Payments", severity: "critical", story: "full refund" });
		});

		it("should take the declared location", () => {
			const group = new ExampleGroup("Cart");
			const example = group.it("counts", () => {}, { location: "spec/cart.test.ts:9" });

			expect(example.location).toBe("spec/cart.test.ts:9");
			expect(example.filePath).toBe("spec/cart.test.ts");
			expect(example.metadata.lineNumber).toBe(9);
		});

		it("should capture the declaring file when no location is given", () => {
			const group = new ExampleGroup("Cart");
			const example = group.it("counts", () => {});

			expect(example.location).toContain("example-group.test.ts:");
		});

		it("should skip examples declared with xit", async () => {
			const group = new ExampleGroup("Cart", { clock });
			const example = group.xit("is disabled", () => {
				throw new Error("never runs");
			});

			await group.run(reporter);

			expect(example.executionResult.status).toBe("pending");
			expect(example.executionResult.pendingMessage).toBe(XIT_MESSAGE);
		});
	});

	describe("run", () => {
		it("should report group and example events in order", async () => {
			const group = new ExampleGroup("Cart", { clock });
			group.it("adds", () => {});
			group.it("breaks", () => {
				throw new Error("boom");
			});
			const child = group.describe("checkout");
			child.it("pays", () => {}, { pending: true });

			const passed = await group.run(reporter);

			expect(passed).toBe(false);
			expect(reporter.eventTypes()).toEqual([
				"groupStarted",
				"exampleStarted",
				"examplePassed",
				"exampleStarted",
				"exampleFailed",
				"groupStarted",
				"exampleStarted",
				"exampleFailed",
				"groupFinished",
				"groupFinished",
			]);
		});

		it("should share beforeAll state with every example as a fresh copy", async () => {
			const group = new ExampleGroup("Inventory", { clock });
			const seen: unknown[] = [];
			let afterAllState: unknown;
			group.beforeAll((state) => {
				state.store = "test-store";
			});
			group.afterAll((state) => {
				afterAllState = { ...state };
			});
			group.it("writes", ({ state }) => {
				seen.push(state.store);
				state.written = true;
			});
			group.it("reads", ({ state }) => {
				seen.push(state.written);
			});
			group.describe("nested", (nested) => {
				nested.it("inherits", ({ state }) => {
					seen.push(state.store);
				});
			});

			expect(await group.run(reporter)).toBe(true);
			expect(seen).toEqual(["test-store", undefined, "test-store"]);
			expect(afterAllState).toEqual({ store: "test-store" });
		});

		it("should fail every example when a beforeAll hook fails", async () => {
			const group = new ExampleGroup("Inventory", { clock });
			const log: string[] = [];
			group.beforeAll(() => {
				throw new Error("seed failed");
			});
			group.afterAll(() => {
				log.push("afterAll");
			});
			const first = group.it("counts", () => {
				log.push("body");
			});
			const nested = group.describe("nested").it("sorts", () => {
				log.push("body");
			});

			const passed = await group.run(reporter);

			expect(passed).toBe(false);
			expect(log).toEqual(["afterAll"]);
			expect(first.exception?.message).toBe("seed failed");
			expect(nested.exception?.message).toBe("seed failed");
			expect(reporter.eventTypes()).toEqual([
				"groupStarted",
				"exampleStarted",
				"exampleFailed",
				"exampleStarted",
				"exampleFailed",
				"groupFinished",
			]);
		});

		it("should report afterAll failures as messages", async () => {
			const group = new ExampleGroup("Inventory", { clock });
			const closeError = new Error("close failed");
			group.afterAll(() => {
				throw closeError;
			});
			group.it("counts", () => {});

			expect(await group.run(reporter)).toBe(true);
			expect(reporter.messages).toEqual([formatFailureCollision(closeError, AFTER_ALL_CONTEXT)]);
		});

		it("should give every example its own mock lifecycle", async () => {
			const log: string[] = [];
			const configuration = new Configuration({ mockFramework: () => createLoggingMocks(log) });
			const group = new ExampleGroup("Mailer", { clock, configuration });
			group.it("sends", () => {
				log.push("body 1");
			});
			group.it("retries", () => {
				log.push("body 2");
			});

			await group.run(reporter);

			expect(log).toEqual([
				"setupMocks",
				"body 1",
				"verifyMocks",
				"teardownMocks",
				"setupMocks",
				"body 2",
				"verifyMocks",
				"teardownMocks",
			]);
		});

		it("should skip group hooks in a dry run", async () => {
			const log: string[] = [];
			const group = new ExampleGroup("Inventory", { clock, configuration: new Configuration({ dryRun: true }) });
			group.beforeAll(() => {
				log.push("beforeAll");
			});
			group.afterAll(() => {
				log.push("afterAll");
			});
			group.it("counts", () => {
				log.push("body");
			});

			expect(await group.run(reporter)).toBe(true);
			expect(log).toEqual([]);
			expect(reporter.examplesWith("examplePassed")).toHaveLength(1);
		});
	});

	describe("runGroups", () => {
		it("should bracket the groups with start and close", async () => {
			const first = new ExampleGroup("First", { clock });
			first.it("passes", () => {});
			const second = new ExampleGroup("Second", { clock });
			second.it("fails", () => {
				throw new Error("boom");
			});

			const passed = await runGroups([first, second], { reporter });

			expect(passed).toBe(false);
			expect(reporter.eventTypes()[0]).toBe("start");
			expect(reporter.eventTypes().at(-1)).toBe("close");
			expect(reporter.examplesWith("examplePassed").map((example) => example.fullDescription)).toEqual([
				"First passes",
			]);
			expect(reporter.examplesWith("exampleFailed").map((example) => example.fullDescription)).toEqual([
				"Second fails",
			]);
		});

		it("should use the configured reporter by default", async () => {
			configure({ reporter });
			const group = new ExampleGroup("Only", { clock });
			group.it("passes", () => {});

			expect(await runGroups([group])).toBe(true);
			expect(reporter.eventTypes()).toEqual([
				"start",
				"groupStarted",
				"exampleStarted",
				"examplePassed",
				"groupFinished",
				"close",
			]);
		});
	});
});
