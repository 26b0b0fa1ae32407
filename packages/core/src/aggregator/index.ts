/**
 * Aggregator module: read-only summaries over cleaned/categorized records.
 */

export { summarizeOverall } from './overall.js';
export { summarizeByCategory } from './by-category.js';
export { summarizeByMonth } from './by-month.js';
