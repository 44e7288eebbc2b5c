/**
 * Warnings
 *
 * Deprecation notices go to the configured reporter; plain warnings go to the
 * configured warn sink.
 */

import { getConfiguration, type Configuration } from "../config/configuration";
import { getCurrentExample } from "../execution/current-example";
import type { DeprecationFields } from "../recording/recording.types";
import { firstNonFrameworkFrame } from "./call-site";

/**
 * Warning options
 */
export interface WarnOptions {
	/** Append the location of the running example */
	specLocation?: boolean;
}

/**
 * Report use of a deprecated feature, with the caller's location
 *
 * @param deprecated - what is deprecated
 * @param data - extra fields (replacement, an explicit callSite, ...)
 */
export function deprecate(
	deprecated: string,
	data: DeprecationFields = {},
	configuration: Configuration = getConfiguration(),
): void {
	configuration.reporter.deprecation({
		deprecated,
		callSite: firstNonFrameworkFrame(),
		...data,
	});
}

/**
 * Report a free-form deprecation message
 */
export function warnDeprecation(message: string, configuration: Configuration = getConfiguration()): void {
	configuration.reporter.deprecation({ message });
}

/**
 * Emit a warning, optionally naming the example that triggered it
 */
export function warnWith(
	message: string,
	options: WarnOptions = {},
	configuration: Configuration = getConfiguration(),
): void {
	let text = message;

	if (options.specLocation) {
		if (!text.endsWith(".")) {
			text += ".";
		}

		const example = getCurrentExample();
		if (example) {
			text += ` Warning generated from spec at \`${example.location}\`.`;
		} else {
			text += " Could not determine which call generated this warning.";
		}
	}

	configuration.warn(text);
}
