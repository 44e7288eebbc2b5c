/**
 * Clock Tests
 */

import { FakeClock, SystemClock } from "trialrun";
import { afterEach, describe, expect, it, vi } from "vitest";

describe("Clock", () => {
	describe("FakeClock", () => {
		it("should only move when told to", () => {
			const clock = new FakeClock(500);

			expect(clock.now()).toBe(500);
			clock.advance(20);
			expect(clock.now()).toBe(520);
			clock.set(1000);
			expect(clock.now()).toBe(1000);
		});

		it("should refuse to move backwards", () => {
			const clock = new FakeClock(100);

			expect(() => clock.advance(-1)).toThrow(RangeError);
			expect(() => clock.set(99)).toThrow("FakeClock cannot move backwards (from 100 to 99)");
		});
	});

	describe("SystemClock", () => {
		afterEach(() => {
			vi.useRealTimers();
		});

		it("should read the wall clock in milliseconds", () => {
			vi.useFakeTimers();
			vi.setSystemTime(new Date("2024-01-02T03:04:05.000Z"));

			expect(new SystemClock().now()).toBe(Date.parse("2024-01-02T03:04:05.000Z"));
		});
	});
});
