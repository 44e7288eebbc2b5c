/**
 * Generated Descriptions
 *
 * Examples declared without a description take the description of the last
 * matcher they used. An assertion library records that description here;
 * the example reads and clears it when its run ends.
 */

/**
 * Source of the last generated matcher description
 */
export interface GeneratedDescriptionSource {
	generatedDescription(): string | undefined;
	clear(): void;
}

/**
 * In-memory store of the last generated description
 */
export class GeneratedDescriptions implements GeneratedDescriptionSource {
	private last?: string;

	/**
	 * Record the description of the matcher that just ran
	 */
	record(description: string): void {
		this.last = description;
	}

	generatedDescription(): string | undefined {
		return this.last;
	}

	clear(): void {
		this.last = undefined;
	}
}
