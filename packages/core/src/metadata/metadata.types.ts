/**
 * Metadata Types
 */

/**
 * Pending or skip directive: `true`, or the reason as a string
 */
export type PendingDirective = boolean | string;

/**
 * Arbitrary user tags (e.g. `{ slow: true, epic: "Billing" }`)
 */
export type Tags = Record<string, unknown>;

/**
 * Metadata accepted when declaring a group or an example.
 *
 * Every key other than the reserved ones is stored as a tag.
 */
export interface MetadataInput {
	/** Mark as pending: the body runs and is expected to fail */
	pending?: PendingDirective;
	/** Mark as skipped: neither hooks nor the body run */
	skip?: PendingDirective;
	/** Declaration site, "path:line" */
	location?: string;
	[tag: string]: unknown;
}

/**
 * Source location split into its parts
 */
export interface ParsedLocation {
	filePath: string;
	lineNumber?: number;
}
