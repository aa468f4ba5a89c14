/**
 * @fileoverview Change aggregation module exports.
 *
 * @module core/changes
 */

// Label categorization
export { LABEL_KEYWORDS, categorizeLabels } from './categories.js';

// Aggregation fold
export {
    aggregateChanges,
    unitItemId,
    issueOrder,
    fallbackIssueDetails,
    sortByOrder,
} from './aggregator.js';

export type { AggregationInput, AggregationResult } from './aggregator.js';
