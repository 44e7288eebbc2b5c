/**
 * Configuration
 *
 * Process-wide settings read by examples and example groups.
 * Examples and groups may also be given a Configuration explicitly.
 */

import { GeneratedDescriptions, type GeneratedDescriptionSource } from "../descriptions";
import type { MockLifecycle } from "../execution/execution.types";
import { noMocks } from "../execution/group-instance";
import type { Reporter } from "../recording/recording.types";
import { ConsoleReporter } from "../recording/reporter";

/**
 * Configuration options
 */
export interface ConfigurationOptions {
	/** Report every example as passed without running hooks or bodies */
	dryRun?: boolean;
	/** Name examples declared without a description after their last matcher */
	expectingMatcherDescriptions?: boolean;
	/** Applied to every example description */
	formatDescription?: (description: string) => string;
	/** Reporter used when no reporter is passed explicitly (diagnostics, deprecations) */
	reporter?: Reporter;
	/** Source of generated matcher descriptions */
	descriptions?: GeneratedDescriptionSource;
	/** Creates the mock lifecycle of each example run */
	mockFramework?: () => MockLifecycle;
	/** Sink for warnings */
	warn?: (message: string) => void;
}

/**
 * Environment variables read by Configuration.fromEnv
 */
export const ENV_DRY_RUN = "TRIALRUN_DRY_RUN";
export const ENV_EXPECT_MATCHER_DESCRIPTIONS = "TRIALRUN_EXPECT_MATCHER_DESCRIPTIONS";

function envFlag(value: string | undefined): boolean | undefined {
	if (value === undefined || value === "") {
		return undefined;
	}
	return value === "true" || value === "1";
}

export class Configuration {
	readonly dryRun: boolean;
	readonly expectingMatcherDescriptions: boolean;
	readonly formatDescription: (description: string) => string;
	readonly reporter: Reporter;
	readonly descriptions: GeneratedDescriptionSource;
	readonly mockFramework: () => MockLifecycle;
	readonly warn: (message: string) => void;

	constructor(options: ConfigurationOptions = {}) {
		this.dryRun = options.dryRun ?? false;
		this.expectingMatcherDescriptions = options.expectingMatcherDescriptions ?? false;
		this.formatDescription = options.formatDescription ?? ((description) => description);
		this.reporter = options.reporter ?? new ConsoleReporter();
		this.descriptions = options.descriptions ?? new GeneratedDescriptions();
		this.mockFramework = options.mockFramework ?? (() => noMocks);
		this.warn = options.warn ?? ((message) => console.warn(message));
	}

	/**
	 * Build a configuration from environment variables, over the given options
	 */
	static fromEnv(env: NodeJS.ProcessEnv = process.env, options: ConfigurationOptions = {}): Configuration {
		return new Configuration({
			...options,
			dryRun: envFlag(env[ENV_DRY_RUN]) ?? options.dryRun,
			expectingMatcherDescriptions:
				envFlag(env[ENV_EXPECT_MATCHER_DESCRIPTIONS]) ?? options.expectingMatcherDescriptions,
		});
	}

	/**
	 * Copy with some options replaced
	 */
	with(options: ConfigurationOptions): Configuration {
		return new Configuration({ ...this.toOptions(), ...options });
	}

	toOptions(): Required<ConfigurationOptions> {
		return {
			dryRun: this.dryRun,
			expectingMatcherDescriptions: this.expectingMatcherDescriptions,
			formatDescription: this.formatDescription,
			reporter: this.reporter,
			descriptions: this.descriptions,
			mockFramework: this.mockFramework,
			warn: this.warn,
		};
	}
}

let current = new Configuration();

/**
 * Current process-wide configuration
 */
export function getConfiguration(): Configuration {
	return current;
}

/**
 * Replace some settings of the process-wide configuration
 */
export function configure(options: ConfigurationOptions): Configuration {
	current = current.with(options);
	return current;
}

/**
 * Restore the default configuration
 */
export function resetConfiguration(): Configuration {
	current = new Configuration();
	return current;
}
