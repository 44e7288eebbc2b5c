/**
 * Metadata Filter
 *
 * Decides whether a hook applies to an example, based on its metadata tags.
 */

import type { ExampleMetadata } from "../metadata";
import type { MetadataCondition, MetadataFilter } from "./hook.types";

function isPredicate(condition: MetadataCondition): condition is (value: unknown) => boolean {
	return typeof condition === "function";
}

/**
 * Check a single condition against a tag value
 */
export function matchCondition(condition: MetadataCondition, value: unknown): boolean {
	if (isPredicate(condition)) {
		return condition(value);
	}
	if (condition === true) {
		return Boolean(value);
	}
	if (Array.isArray(value)) {
		return value.includes(condition);
	}
	return value === condition;
}

/**
 * Check that every key of the filter applies to the example
 */
export function matchFilter(filter: MetadataFilter | undefined, metadata: ExampleMetadata): boolean {
	if (!filter) {
		return true;
	}
	return Object.entries(filter).every(([key, condition]) => matchCondition(condition, metadata.tag(key)));
}
