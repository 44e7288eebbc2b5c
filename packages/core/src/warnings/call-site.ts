/**
 * Call Site
 *
 * Finds the first stack frame that is not part of the framework, so
 * deprecations and declarations can point at user code.
 */

import { fileURLToPath } from "node:url";

/**
 * Directory holding the framework sources (the package's src/)
 */
export const FRAMEWORK_ROOT = fileURLToPath(new URL("../", import.meta.url));

const INTERNAL_PREFIXES = ["node:", "internal/"];

/**
 * Extract "path:line" from one V8 stack line, or undefined for frames
 * without a file location
 */
export function parseStackLine(line: string): string | undefined {
	const trimmed = line.trim();
	if (!trimmed.startsWith("at ")) {
		return undefined;
	}

	const match = /\(?((?:file:\/\/)?[^()\s]+?):(\d+)(?::\d+)?\)?$/.exec(trimmed);
	if (!match) {
		return undefined;
	}

	const path = match[1].startsWith("file://") ? fileURLToPath(match[1]) : match[1];
	return `${path}:${match[2]}`;
}

function isFrameworkFrame(location: string, frameworkRoot: string): boolean {
	return location.startsWith(frameworkRoot) || INTERNAL_PREFIXES.some((prefix) => location.startsWith(prefix));
}

/**
 * First "path:line" of the stack outside the framework
 */
export function firstNonFrameworkFrame(
	stack: string = new Error().stack ?? "",
	frameworkRoot: string = FRAMEWORK_ROOT,
): string | undefined {
	for (const line of stack.split("\n")) {
		const location = parseStackLine(line);
		if (location && !isFrameworkFrame(location, frameworkRoot)) {
			return location;
		}
	}
	return undefined;
}
