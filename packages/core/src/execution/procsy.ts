/**
 * Procsy
 *
 * Deferred invocation of an example's pipeline, handed to around hooks.
 *
 * An around hook decides whether and when the wrapped pipeline runs:
 * not calling run() means neither before/after hooks nor the body execute;
 * calling it twice runs the pipeline twice.
 *
 * @example
 * ```typescript
 * group.around(async (example) => {
 *   if (example.metadata.tag("requiresNetwork") && offline) {
 *     return;
 *   }
 *   await example.run();
 * });
 * ```
 */

import type { ExampleMetadata } from "../metadata";

export type ProcsyBody = () => Promise<void>;

export class Procsy {
	constructor(
		readonly metadata: ExampleMetadata,
		private readonly body: ProcsyBody,
	) {}

	/**
	 * Run the wrapped pipeline
	 */
	run(): Promise<void> {
		return this.body();
	}

	/**
	 * Same metadata, different pipeline (used to layer around hooks)
	 */
	wrap(body: ProcsyBody): Procsy {
		return new Procsy(this.metadata, body);
	}
}
