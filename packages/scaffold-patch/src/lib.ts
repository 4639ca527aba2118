export * from './engine/index.js';
export { PlanRunner, type RunOptions } from './plan/runner.js';
export { PlanValidationError, loadPlan, parsePlan, resolveContent, type LoadedPlan } from './plan/loader.js';
export { MigrationPlanSchema, type MigrationPlan, type MigrationPlanInput } from './plan/schema.js';
export { getPlansDir, listBundledPlans, resolvePlanPath } from './plan/bundled.js';
export { FileMergeJournal, getStatePath, readState, writeState } from './utils/state.js';
export type { PlanReport, StepAction, StepKind, StepResult } from './types.js';
