/**
 * Allure Reporter for Trialrun
 *
 * Writes Allure result files for every finished example.
 *
 * @example
 * ```typescript
 * import { runGroups } from 'trialrun';
 * import { AllureReporter } from '@trialrun/reporter-allure';
 *
 * await runGroups(groups, {
 *   reporter: new AllureReporter({
 *     resultsDir: 'allure-results',
 *     environmentInfo: { node: process.version },
 *   }),
 * });
 * ```
 */

export { ContentType, LabelName, LinkType, Stage, Status } from "allure-js-commons";
export { AllureReporter, DEFAULT_RESULTS_DIR } from "./allure-reporter";
export * from "./result-converter";
export type { AllureReporterOptions } from "./types";
export { FileSystemWriter } from "./writers/file-writer";
export type { AllureWriter } from "./writers/writer";
