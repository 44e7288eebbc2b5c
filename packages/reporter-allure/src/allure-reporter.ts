/**
 * Allure Reporter
 *
 * Writes one Allure result per finished example and one container per group.
 */

import type { DeprecationFields, Example, GroupMetadata, ReportedGroup, Reporter } from "trialrun";
import { convertExample, convertToContainer } from "./result-converter";
import type { AllureReporterOptions } from "./types";
import { FileSystemWriter } from "./writers/file-writer";
import type { AllureWriter } from "./writers/writer";

export const DEFAULT_RESULTS_DIR = "allure-results";

export class AllureReporter implements Reporter {
	readonly name = "allure";
	private readonly options: AllureReporterOptions;
	private readonly writer: AllureWriter;
	private readonly resultsByGroup = new Map<GroupMetadata, string[]>();

	/**
	 * @param writer - destination of the result files (default: FileSystemWriter on resultsDir)
	 */
	constructor(options: AllureReporterOptions = {}, writer?: AllureWriter) {
		this.options = { resultsDir: DEFAULT_RESULTS_DIR, ...options };
		this.writer = writer ?? new FileSystemWriter(this.options.resultsDir ?? DEFAULT_RESULTS_DIR);
	}

	getOptions(): AllureReporterOptions {
		return this.options;
	}

	exampleStarted(_example: Example): void {}

	examplePassed(example: Example): void {
		this.record(example);
	}

	exampleFailed(example: Example): void {
		this.record(example);
	}

	examplePending(example: Example): void {
		this.record(example);
	}

	groupFinished(group: ReportedGroup): void {
		const uuids = this.resultsByGroup.get(group.metadata) ?? [];
		this.resultsByGroup.delete(group.metadata);
		this.writer.writeContainer(convertToContainer(group.metadata, uuids));
	}

	// Allure results have no place for free-form diagnostics
	message(_message: string): void {}

	deprecation(_fields: DeprecationFields): void {}

	close(): void {
		if (this.options.environmentInfo) {
			this.writer.writeEnvironment(this.options.environmentInfo);
		}
	}

	private record(example: Example): void {
		const result = convertExample(example, this.options, this.writer);
		this.writer.writeTestResult(result);

		const group = example.metadata.group;
		const uuids = this.resultsByGroup.get(group) ?? [];
		uuids.push(result.uuid);
		this.resultsByGroup.set(group, uuids);
	}
}
