/**
 * Allure Writer Interface
 *
 * Defines the contract for writing Allure result files.
 */

import type { TestResult, TestResultContainer } from "allure-js-commons";

/**
 * Interface for writing Allure result files
 */
export interface AllureWriter {
	/**
	 * Write test result JSON file
	 */
	writeTestResult(result: TestResult): void;

	/**
	 * Write container JSON file
	 */
	writeContainer(container: TestResultContainer): void;

	/**
	 * Write environment.properties file
	 */
	writeEnvironment(info: Record<string, string>): void;

	/**
	 * Write attachment file
	 * @returns Generated filename, used as the attachment source
	 */
	writeAttachment(name: string, content: Buffer, mimeType: string): string;
}
