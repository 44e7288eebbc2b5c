/**
 * Current Example
 *
 * Process-wide marker of the example being run, read by helpers such as the
 * warnings formatter. Examples run one at a time, so a single slot is enough;
 * Example.run sets it on entry and always clears it on exit.
 */

import type { Example } from "./example";

let current: Example | undefined;

export function getCurrentExample(): Example | undefined {
	return current;
}

export function setCurrentExample(example: Example | undefined): void {
	current = example;
}
