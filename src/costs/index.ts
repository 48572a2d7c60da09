/**
 * Model pricing and cost calculation.
 *
 * @example
 * ```typescript
 * import { modelRegistry, formatCost } from './costs/index.js';
 *
 * const cost = modelRegistry.calculateCost('gpt-4o-mini', {
 *   promptTokens: 1000,
 *   completionTokens: 500,
 *   totalTokens: 1500,
 * });
 * formatCost(cost); // '$0.000450'
 * ```
 */

export * from './model-registry.js';
