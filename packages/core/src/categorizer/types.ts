/**
 * Internal types for categorizer module.
 */

import type { CategorizedRecordSet } from '../records/types.js';

/**
 * Result of categorizing one description.
 * `keyword` is the keyword that matched, or null for the default category.
 */
export interface CategorizationResult {
    category: string;
    keyword: string | null;
}

/**
 * Statistics from batch categorization.
 */
export interface CategorizationStats {
    total: number;
    byCategory: Record<string, number>;
    uncategorized: number;
}

export interface CategorizeAllResult {
    records: CategorizedRecordSet;
    stats: CategorizationStats;
}
