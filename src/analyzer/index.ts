/**
 * Analyzer exports
 */

export { groupCycles, createCycle } from './cycle-grouper.js';
export { StatisticsAggregator, computeStatistics } from './statistics.js';
export {
  truncate,
  collapseWhitespace,
  describeResponse,
  contentPreview,
  labeledPreview,
  NO_RESPONSE_PREVIEW,
} from './previews.js';
