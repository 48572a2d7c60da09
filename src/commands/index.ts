export { formatRun } from './format.js';
export { summarizeRun, jsonPathFor } from './summary.js';
export type * from './types.js';
