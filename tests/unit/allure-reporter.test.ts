/**
 * Allure Reporter Tests
 *
 * Full reporter lifecycle with real file I/O in a temporary directory.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { AllureReporter, DEFAULT_RESULTS_DIR, FileSystemWriter, Status } from "@trialrun/reporter-allure";
import { ExampleGroup, FakeClock, runGroups } from "trialrun";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

const readJson = (dir: string, suffix: string): Array<Record<string, unknown>> =>
	fs
		.readdirSync(dir)
		.filter((file) => file.endsWith(suffix))
		.map((file) => JSON.parse(fs.readFileSync(path.join(dir, file), "utf-8")));

describe("AllureReporter", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "allure-test-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("should default the results directory", () => {
		const reporter = new AllureReporter({}, new FileSystemWriter(tempDir));

		expect(reporter.name).toBe("allure");
		expect(reporter.getOptions().resultsDir).toBe(DEFAULT_RESULTS_DIR);
	});

	it("should write one result per example and one container per group", async () => {
		const clock = new FakeClock(100);
		const group = new ExampleGroup("Payments", { clock });
		group.it("charges", () => {});
		group.it("declines", () => {
			throw new Error("expected approval");
		});
		const refunds = group.describe("refunds");
		refunds.it("refunds later", undefined);

		const reporter = new AllureReporter({ resultsDir: tempDir, environmentInfo: { node: "20", region: "test" } });
		const passed = await runGroups([group], { reporter });

		expect(passed).toBe(false);

		const results = readJson(tempDir, "-result.json");
		const statusByName = Object.fromEntries(results.map((result) => [result.name, result.status]));
		expect(statusByName).toEqual({
			charges: Status.PASSED,
			declines: Status.FAILED,
			"refunds later": Status.SKIPPED,
		});

		const containers = readJson(tempDir, "-container.json");
		const childrenByName = Object.fromEntries(containers.map((container) => [container.name, container.children]));
		const uuidOf = (name: string) => results.find((result) => result.name === name)?.uuid;
		expect(childrenByName).toEqual({
			Payments: [uuidOf("charges"), uuidOf("declines")],
			"Payments refunds": [uuidOf("refunds later")],
		});

		expect(fs.readFileSync(path.join(tempDir, "environment.properties"), "utf-8")).toBe("node=20\nregion=test");
	});

	it("should not write environment info unless configured", async () => {
		const group = new ExampleGroup("Payments", { clock: new FakeClock() });
		group.it("charges", () => {});

		await runGroups([group], { reporter: new AllureReporter({ resultsDir: tempDir }) });

		expect(fs.existsSync(path.join(tempDir, "environment.properties"))).toBe(false);
	});

	it("should write the failure of a pending example as an attachment", async () => {
		const group = new ExampleGroup("Payments", { clock: new FakeClock() });
		group.it(
			"settles in crypto",
			() => {
				throw new Error("unsupported currency");
			},
			{ pending: "not offered yet" },
		);

		await runGroups([group], { reporter: new AllureReporter({ resultsDir: tempDir }) });

		const attachments = fs.readdirSync(tempDir).filter((file) => file.endsWith("-attachment.txt"));
		expect(attachments).toHaveLength(1);
		expect(fs.readFileSync(path.join(tempDir, attachments[0]), "utf-8")).toContain("unsupported currency");
	});
});
