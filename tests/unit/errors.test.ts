/**
 * Execution Errors Tests
 */

import { firstBacktraceFrame, formatFailureCollision, PendingExampleFixedError, toError } from "trialrun";
import { describe, expect, it } from "vitest";

describe("Execution errors", () => {
	it("should keep errors and wrap other thrown values", () => {
		const error = new TypeError("bad type");

		expect(toError(error)).toBe(error);
		expect(toError(42).message).toBe("42");
	});

	it("should read the first frame of a stack", () => {
		const error = new Error("boom");
		error.stack = "Error: boom\n    at parse (/srv/app/parser.ts:10:3)\n    at main (/srv/app/index.ts:2:1)";

		expect(firstBacktraceFrame(error)).toBe("parse (/srv/app/parser.ts:10:3)");
	});

	it("should have no frame without a stack", () => {
		const error = new Error("boom");
		error.stack = undefined;

		expect(firstBacktraceFrame(error)).toBeUndefined();
	});

	it("should point a fixed pending example at its declaration", () => {
		const error = new PendingExampleFixedError("passed", "spec/a.test.ts:3");

		expect(error.name).toBe("PendingExampleFixedError");
		expect(firstBacktraceFrame(error)).toBe("spec/a.test.ts:3");
	});

	it("should format a discarded failure", () => {
		const error = new Error("cleanup");
		error.stack = "Error: cleanup\n    at close (/srv/app/db.ts:7:5)";

		expect(formatFailureCollision(error, "in an after(:each) hook")).toBe(
			"\nAn error occurred in an after(:each) hook\n  Error: cleanup\n  occurred at close (/srv/app/db.ts:7:5)\n\n",
		);
	});

	it("should format a discarded failure without context or stack", () => {
		const error = new RangeError("too far");
		error.stack = undefined;

		expect(formatFailureCollision(error)).toBe("\nAn error occurred\n  RangeError: too far\n  occurred at unknown location\n\n");
	});
});
