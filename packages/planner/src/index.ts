export { PlanBook, EMPTY_SUGGESTION } from './plan-book.js';
export type { AppendedPlan, PlanBookOptions } from './plan-book.js';
