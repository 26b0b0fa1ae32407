/**
 * Types for the keyword table.
 */

/**
 * One normalized keyword and its compiled whole-word matcher.
 */
export interface KeywordRule {
    readonly keyword: string;
    readonly pattern: RegExp;
}

export interface KeywordCategory {
    readonly category: string;
    readonly keywords: readonly KeywordRule[];
}

/**
 * Frozen, ordered category -> keywords table. Safe to share across runs.
 */
export interface KeywordTable {
    readonly categories: readonly KeywordCategory[];
}

/**
 * A keyword that can never win because an earlier category's keyword
 * already matches every description it would match.
 */
export interface KeywordCollision {
    keyword: string;
    category: string;
    shadowedBy: {
        keyword: string;
        category: string;
    };
}
