/**
 * FileSystem Writer
 *
 * Writes Allure result files to the file system.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import type { TestResult, TestResultContainer } from "allure-js-commons";
import type { AllureWriter } from "./writer";

const MIME_TO_EXTENSION: Record<string, string> = {
	"application/json": "json",
	"text/plain": "txt",
	"text/html": "html",
	"text/xml": "xml",
};

export class FileSystemWriter implements AllureWriter {
	constructor(private readonly resultsDir: string) {
		fs.mkdirSync(resultsDir, { recursive: true });
	}

	writeTestResult(result: TestResult): void {
		this.write(`${result.uuid}-result.json`, JSON.stringify(result, null, 2));
	}

	writeContainer(container: TestResultContainer): void {
		this.write(`${container.uuid}-container.json`, JSON.stringify(container, null, 2));
	}

	/**
	 * One "key=value" line per entry
	 */
	writeEnvironment(info: Record<string, string>): void {
		const lines = Object.entries(info).map(([key, value]) => `${key}=${value}`);
		this.write("environment.properties", lines.join("\n"));
	}

	writeAttachment(_name: string, content: Buffer, mimeType: string): string {
		const extension = MIME_TO_EXTENSION[mimeType] ?? "bin";
		const filename = `${randomUUID()}-attachment.${extension}`;
		this.write(filename, content);
		return filename;
	}

	getResultsDir(): string {
		return this.resultsDir;
	}

	private write(filename: string, content: string | Buffer): void {
		fs.writeFileSync(path.join(this.resultsDir, filename), content);
	}
}
