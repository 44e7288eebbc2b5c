/**
 * Result Converter
 *
 * Pure functions converting finished examples to Allure results.
 */

import { createHash, randomUUID } from "node:crypto";
import {
	type Attachment,
	ContentType,
	type Label,
	LabelName,
	type Link,
	LinkType,
	Stage,
	Status,
	type StatusDetails,
	type TestResult,
	type TestResultContainer,
} from "allure-js-commons";
import type { Example, ExampleMetadata, ExecutionResult, GroupMetadata, TerminalStatus } from "trialrun";
import type { AllureReporterOptions } from "./types";
import type { AllureWriter } from "./writers/writer";

export const FRAMEWORK_NAME = "trialrun";

/**
 * Generate MD5 hash for historyId/testCaseId
 */
function md5(input: string): string {
	return createHash("md5").update(input).digest("hex");
}

function stringTag(metadata: ExampleMetadata, key: string): string | undefined {
	const value = metadata.tags[key];
	return typeof value === "string" ? value : undefined;
}

function stringListTag(metadata: ExampleMetadata, key: string): string[] {
	const value = metadata.tags[key];
	if (typeof value === "string") {
		return [value];
	}
	return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

/**
 * Assertion failures are "failed"; anything else thrown is "broken"
 */
export function isAssertionError(error: Error): boolean {
	if (error.name === "AssertionError") {
		return true;
	}
	const message = error.message.toLowerCase();
	return message.includes("assert") || message.includes("expect");
}

/**
 * Convert a terminal example status to Allure Status enum
 */
export function convertStatus(status: TerminalStatus, exception?: Error): Status {
	switch (status) {
		case "passed":
			return Status.PASSED;
		case "pending":
			return Status.SKIPPED;
		case "failed":
			return exception && isAssertionError(exception) ? Status.FAILED : Status.BROKEN;
	}
}

/**
 * Failure message and trace, or the pending message
 */
export function convertStatusDetails(result: ExecutionResult): StatusDetails {
	if (result.exception) {
		return { message: result.exception.message, trace: result.exception.stack };
	}
	if (result.pendingMessage !== undefined) {
		return { message: result.pendingMessage };
	}
	return {};
}

/**
 * parentSuite / suite / subSuite labels from the group chain
 */
export function convertGroupsToSuiteLabels(group: GroupMetadata): Label[] {
	const names = group
		.ancestors()
		.map((ancestor) => ancestor.description)
		.filter((description) => description.length > 0);

	if (names.length === 0) {
		return [];
	}
	if (names.length === 1) {
		return [{ name: LabelName.SUITE, value: names[0] }];
	}

	const labels: Label[] = [
		{ name: LabelName.PARENT_SUITE, value: names[0] },
		{ name: LabelName.SUITE, value: names[1] },
	];
	if (names.length > 2) {
		labels.push({ name: LabelName.SUB_SUITE, value: names.slice(2).join(" > ") });
	}
	return labels;
}

/**
 * Convert example tags to Allure labels
 */
export function convertMetadataToLabels(metadata: ExampleMetadata, options: AllureReporterOptions): Label[] {
	const labels: Label[] = [
		{ name: LabelName.FRAMEWORK, value: FRAMEWORK_NAME },
		{ name: LabelName.LANGUAGE, value: "typescript" },
		...(options.labels ?? []),
		...convertGroupsToSuiteLabels(metadata.group),
	];

	const id = stringTag(metadata, "id");
	if (id) {
		labels.push({ name: LabelName.ALLURE_ID, value: id });
	}

	const epic = stringTag(metadata, "epic") ?? options.defaultEpic;
	if (epic) {
		labels.push({ name: LabelName.EPIC, value: epic });
	}

	const feature = stringTag(metadata, "feature") ?? options.defaultFeature;
	if (feature) {
		labels.push({ name: LabelName.FEATURE, value: feature });
	}

	const story = stringTag(metadata, "story");
	if (story) {
		labels.push({ name: LabelName.STORY, value: story });
	}

	const severity = stringTag(metadata, "severity");
	if (severity) {
		labels.push({ name: LabelName.SEVERITY, value: severity });
	}

	for (const tag of stringListTag(metadata, "tags")) {
		labels.push({ name: LabelName.TAG, value: tag });
	}

	return labels;
}

/**
 * TMS link from the "id" tag, issue links from the "issues" tag
 */
export function convertMetadataToLinks(metadata: ExampleMetadata, options: AllureReporterOptions): Link[] {
	const links: Link[] = [];

	const id = stringTag(metadata, "id");
	if (id && options.tmsUrlPattern) {
		links.push({ name: id, url: options.tmsUrlPattern.replace("{id}", id), type: LinkType.TMS });
	}

	if (options.issueUrlPattern) {
		for (const issue of stringListTag(metadata, "issues")) {
			links.push({ name: issue, url: options.issueUrlPattern.replace("{id}", issue), type: LinkType.ISSUE });
		}
	}

	return links;
}

/**
 * The failure a pending example raised, as a text attachment
 */
function pendingExceptionAttachment(result: ExecutionResult, writer: AllureWriter): Attachment | undefined {
	const exception = result.pendingException;
	if (!exception) {
		return undefined;
	}

	const content = Buffer.from(exception.stack ?? `${exception.name}: ${exception.message}`, "utf-8");
	const source = writer.writeAttachment("pending-exception.txt", content, ContentType.TEXT);
	return { name: "Pending exception", source, type: ContentType.TEXT };
}

/**
 * Convert a finished example to an Allure TestResult
 */
export function convertExample(example: Example, options: AllureReporterOptions, writer?: AllureWriter): TestResult {
	const result = example.executionResult;
	const status = result.status;
	if (status !== "passed" && status !== "failed" && status !== "pending") {
		throw new Error(`Example "${example.fullDescription}" has not finished (status: ${status})`);
	}

	const fullName = example.fullDescription;
	const attachment = writer ? pendingExceptionAttachment(result, writer) : undefined;
	const description = stringTag(example.metadata, "description");

	return {
		uuid: randomUUID(),
		historyId: md5(fullName),
		testCaseId: md5(fullName),
		name: example.description,
		fullName,
		description,
		status: convertStatus(status, result.exception),
		statusDetails: convertStatusDetails(result),
		stage: Stage.FINISHED,
		start: result.startedAt,
		stop: result.finishedAt,
		steps: [],
		labels: convertMetadataToLabels(example.metadata, options),
		links: convertMetadataToLinks(example.metadata, options),
		attachments: attachment ? [attachment] : [],
		parameters: [{ name: "location", value: example.location }],
	};
}

/**
 * Convert a group to an Allure TestResultContainer holding its examples' results
 */
export function convertToContainer(group: GroupMetadata, testResultUuids: string[]): TestResultContainer {
	return {
		uuid: randomUUID(),
		name: group.fullDescription,
		children: testResultUuids,
		befores: [],
		afters: [],
	};
}
