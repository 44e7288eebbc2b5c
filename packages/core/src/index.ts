/**
 * Trialrun Core
 *
 * Execution engine of a behaviour-driven test framework: examples with
 * before/after/around hooks, pending and skipped examples, first-failure
 * capture and reporting.
 *
 * For reporters:
 * - @trialrun/reporter-allure - Allure results
 *
 * @example
 * ```typescript
 * import { describe, runGroups, ConsoleReporter } from 'trialrun';
 *
 * const group = describe('Orders', (group) => {
 *   group.before(({ state }) => {
 *     state.orders = [];
 *   });
 *
 *   group.it('starts empty', ({ state }) => {
 *     if (!Array.isArray(state.orders) || state.orders.length !== 0) {
 *       throw new Error('expected no orders');
 *     }
 *   });
 *
 *   group.it('ships', undefined, { pending: 'shipping not built' });
 * });
 *
 * await runGroups([group], { reporter: new ConsoleReporter() });
 * ```
 */

// Clock (SystemClock, FakeClock)
export * from "./clock";
// Configuration (Configuration, configure, getConfiguration)
export * from "./config";
// Generated descriptions
export * from "./descriptions";
// Execution (Example, ExampleGroup, Procsy, ExecutionResult, runGroups, etc.)
export * from "./execution";
// Hooks (HookRegistry, metadata filters)
export * from "./hooks";
// Metadata (GroupMetadata, ExampleMetadata)
export * from "./metadata";
// Recording (Reporter, ConsoleReporter, JsonReporter, etc.)
export * from "./recording";
// Warnings (deprecate, warnWith)
export * from "./warnings";
export { generateId } from "./utils";
