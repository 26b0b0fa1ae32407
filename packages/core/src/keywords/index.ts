/**
 * Keyword table module: ordered categorization configuration.
 */

export { createKeywordTable, parseKeywordTableInput, categoryNames, keywordTableToEntries } from './table.js';
export { findKeywordCollisions, describeCollisions } from './collisions.js';
export type { KeywordTable, KeywordCategory, KeywordRule, KeywordCollision } from './types.js';
