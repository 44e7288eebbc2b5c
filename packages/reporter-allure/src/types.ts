/**
 * Allure Reporter Types
 */

import type { Label } from "allure-js-commons";

/**
 * Allure reporter options
 */
export interface AllureReporterOptions {
	/** Output directory (default: "allure-results") */
	resultsDir?: string;

	/** Environment info written to environment.properties on close */
	environmentInfo?: Record<string, string>;

	/** Default labels for all examples */
	labels?: Label[];

	/** URL pattern for TMS links (use {id} placeholder) */
	tmsUrlPattern?: string;

	/** URL pattern for issue links (use {id} placeholder) */
	issueUrlPattern?: string;

	/** Epic for examples without an "epic" tag */
	defaultEpic?: string;

	/** Feature for examples without a "feature" tag */
	defaultFeature?: string;
}
