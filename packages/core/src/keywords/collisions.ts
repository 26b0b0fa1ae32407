/**
 * Keyword collision check.
 *
 * Categories are tried in declaration order, so a keyword is dead when an
 * earlier category holds a keyword that matches it as a whole word:
 * "rent" under Housing shadows "rent" and "rent refund" under Refunds.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import type { KeywordCollision, KeywordTable } from './types.js';

/**
 * Find every keyword shadowed by an earlier-declared category.
 * Only the first shadowing keyword is reported for each.
 */
export function findKeywordCollisions(table: KeywordTable): KeywordCollision[] {
    const collisions: KeywordCollision[] = [];
    const { categories } = table;

    for (let later = 1; later < categories.length; later++) {
        for (const rule of categories[later].keywords) {
            const shadow = findShadow(table, later, rule.keyword);
            if (shadow) {
                collisions.push({
                    keyword: rule.keyword,
                    category: categories[later].category,
                    shadowedBy: shadow,
                });
            }
        }
    }

    return collisions;
}

/**
 * Human-readable warning lines for a collision list.
 */
export function describeCollisions(collisions: KeywordCollision[]): string[] {
    return collisions.map((c) =>
        `Keyword "${c.keyword}" in "${c.category}" never matches: ` +
        `"${c.shadowedBy.keyword}" in "${c.shadowedBy.category}" is declared earlier`
    );
}

function findShadow(
    table: KeywordTable,
    before: number,
    keyword: string
): KeywordCollision['shadowedBy'] | null {
    for (let earlier = 0; earlier < before; earlier++) {
        const entry = table.categories[earlier];
        for (const rule of entry.keywords) {
            if (rule.pattern.test(keyword)) {
                return { keyword: rule.keyword, category: entry.category };
            }
        }
    }
    return null;
}
