/**
 * Metadata
 *
 * Typed metadata records for example groups and examples.
 * An example's metadata is derived once from its group's metadata:
 * tags and pending/skip directives are inherited unless overridden.
 */

import { ExecutionResult } from "../execution/execution-result";
import type { MetadataInput, ParsedLocation, PendingDirective, Tags } from "./metadata.types";

const RESERVED_KEYS = new Set(["pending", "skip", "location"]);

export const UNKNOWN_LOCATION = "unknown";

/**
 * Split "path:line" into file path and line number
 */
export function parseLocation(location: string): ParsedLocation {
	const match = /^(.*):(\d+)$/.exec(location);
	if (!match) {
		return { filePath: location };
	}
	return { filePath: match[1], lineNumber: Number(match[2]) };
}

function extractTags(input: MetadataInput): Tags {
	const tags: Tags = {};
	for (const [key, value] of Object.entries(input)) {
		if (!RESERVED_KEYS.has(key)) {
			tags[key] = value;
		}
	}
	return tags;
}

/**
 * Metadata of an example group
 */
export class GroupMetadata {
	readonly description: string;
	readonly location: string;
	readonly parent?: GroupMetadata;
	readonly tags: Readonly<Tags>;
	readonly pending?: PendingDirective;
	readonly skip?: PendingDirective;

	constructor(description: string, input: MetadataInput = {}, parent?: GroupMetadata) {
		this.description = description;
		this.location = input.location ?? UNKNOWN_LOCATION;
		this.parent = parent;
		this.tags = { ...parent?.tags, ...extractTags(input) };
		this.pending = input.pending ?? parent?.pending;
		this.skip = input.skip ?? parent?.skip;
	}

	/**
	 * Group chain from the outermost group down to this one
	 */
	ancestors(): GroupMetadata[] {
		const chain: GroupMetadata[] = [];
		for (let current: GroupMetadata | undefined = this; current; current = current.parent) {
			chain.unshift(current);
		}
		return chain;
	}

	get fullDescription(): string {
		return this.ancestors()
			.map((group) => group.description)
			.filter((description) => description.length > 0)
			.join(" ");
	}

	/**
	 * Derive metadata for a nested group
	 */
	forGroup(description: string, input: MetadataInput = {}): GroupMetadata {
		return new GroupMetadata(description, input, this);
	}

	/**
	 * Derive metadata for an example declared in this group
	 */
	forExample(description: string | undefined, input: MetadataInput = {}): ExampleMetadata {
		return new ExampleMetadata(this, description, input);
	}
}

/**
 * Metadata of a single example
 */
export class ExampleMetadata {
	readonly group: GroupMetadata;
	readonly descriptionArgs: string[];
	readonly location: string;
	readonly filePath: string;
	readonly lineNumber?: number;
	readonly tags: Readonly<Tags>;
	readonly executionResult = new ExecutionResult();

	pending?: PendingDirective;
	skip?: PendingDirective;

	constructor(group: GroupMetadata, description: string | undefined, input: MetadataInput = {}) {
		this.group = group;
		this.descriptionArgs = description ? [description] : [];
		this.location = input.location ?? UNKNOWN_LOCATION;
		const { filePath, lineNumber } = parseLocation(this.location);
		this.filePath = filePath;
		this.lineNumber = lineNumber;
		this.tags = { ...group.tags, ...extractTags(input) };
		this.pending = input.pending ?? group.pending;
		this.skip = input.skip ?? group.skip;
	}

	get description(): string {
		return this.descriptionArgs.join(" ");
	}

	get fullDescription(): string {
		return [this.group.fullDescription, this.description].filter((part) => part.length > 0).join(" ");
	}

	/**
	 * Look up a tag; "pending" and "skip" read the live directives
	 */
	tag(key: string): unknown {
		if (key === "pending") {
			return this.pending;
		}
		if (key === "skip") {
			return this.skip;
		}
		return this.tags[key];
	}
}
