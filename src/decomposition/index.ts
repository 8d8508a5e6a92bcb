export { QueryDecomposer, IMPERATIVE_VERBS } from './query-decomposer.js';
export { createExecutionPlan } from './execution-plan.js';
