/**
 * View exports
 */

export { SummaryView, createSummaryView, type SummaryViewData, type SummaryViewOptions } from './summary-view.js';
export { TimelineView, createTimelineView, type TimelineViewData } from './timeline-view.js';
