/**
 * Group Instance
 *
 * Execution context of one example run: its local state and the mock
 * lifecycle for that run.
 */

import type { ExampleGroupInstance, ExampleState, MockLifecycle } from "./execution.types";

/**
 * Mock lifecycle that does nothing (no mocking library configured)
 */
export const noMocks: MockLifecycle = {
	setupMocks() {},
	verifyMocks() {},
	teardownMocks() {},
};

export class GroupInstance implements ExampleGroupInstance {
	readonly state: ExampleState;

	constructor(
		private readonly mocks: MockLifecycle = noMocks,
		initialState: ExampleState = {},
	) {
		this.state = { ...initialState };
	}

	setupMocks(): void | Promise<void> {
		return this.mocks.setupMocks();
	}

	verifyMocks(): void | Promise<void> {
		return this.mocks.verifyMocks();
	}

	teardownMocks(): void | Promise<void> {
		return this.mocks.teardownMocks();
	}

	clearState(): void {
		for (const key of Object.keys(this.state)) {
			delete this.state[key];
		}
	}
}
