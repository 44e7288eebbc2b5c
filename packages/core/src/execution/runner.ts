/**
 * Runner
 *
 * Runs top-level example groups against one reporter.
 */

import { getConfiguration } from "../config/configuration";
import type { Reporter } from "../recording/recording.types";
import type { ExampleGroup } from "./example-group";

/**
 * Run options
 */
export interface RunOptions {
	/** Reporter receiving every event (default: the configured reporter) */
	reporter?: Reporter;
}

/**
 * Run groups in declaration order.
 *
 * @returns true when no example failed
 */
export async function runGroups(groups: readonly ExampleGroup[], options: RunOptions = {}): Promise<boolean> {
	const reporter = options.reporter ?? getConfiguration().reporter;
	const count = groups.reduce((sum, group) => sum + group.descendantExamples().length, 0);

	reporter.start?.(count);

	let passed = true;
	try {
		for (const group of groups) {
			passed = (await group.run(reporter)) && passed;
		}
	} finally {
		reporter.close?.();
	}

	return passed;
}
