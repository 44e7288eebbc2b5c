/**
 * Test Helpers
 *
 * Shared utilities for engine unit tests.
 */

import { vi } from "vitest";
import type { Example, MockLifecycle, Reporter } from "trialrun";
import { GroupInstance, RecordingReporter } from "trialrun";

/**
 * Mock lifecycle whose calls are spies; verifyMocks throws `verifyError` when given
 */
export const createMocks = (verifyError?: Error) => ({
	setupMocks: vi.fn(),
	verifyMocks: vi.fn(() => {
		if (verifyError) {
			throw verifyError;
		}
	}),
	teardownMocks: vi.fn(),
});

/**
 * Mock lifecycle appending its calls to a shared log
 */
export const createLoggingMocks = (log: string[]): MockLifecycle => ({
	setupMocks: () => {
		log.push("setupMocks");
	},
	verifyMocks: () => {
		log.push("verifyMocks");
	},
	teardownMocks: () => {
		log.push("teardownMocks");
	},
});

/**
 * Run an example in a fresh group instance
 */
export const runExample = (
	example: Example,
	reporter: Reporter = new RecordingReporter(),
	mocks?: MockLifecycle,
): Promise<boolean> => example.run(new GroupInstance(mocks), reporter);
