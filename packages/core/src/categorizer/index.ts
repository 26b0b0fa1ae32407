/**
 * Categorizer module: keyword-based transaction categorization.
 */

export { categorize, categorizeAll } from './categorize.js';
export { compileKeyword, matchesKeyword } from './match.js';
export type { CategorizationResult, CategorizationStats, CategorizeAllResult } from './types.js';
