import { describe, it, expect } from 'vitest';
import { ConfigError } from '@ledgerlens/shared';
import { categoryNames, findKeywordCollisions, keywordTableToEntries, categorize } from '@ledgerlens/core';
import { loadKeywordTable, keywordTableFromYaml } from '../src/workspace/config.js';
import { getDefaultKeywordsPath } from '../src/workspace/paths.js';

describe('Default keyword table', () => {
    const table = loadKeywordTable(getDefaultKeywordsPath());

    it('loads in declared order', () => {
        expect(categoryNames(table)).toEqual([
            'Income',
            'Housing',
            'Utilities',
            'Groceries',
            'Dining',
            'Transportation',
            'Shopping',
            'Entertainment',
            'Health',
            'Transfers',
        ]);
    });

    it('has no shadowed keywords', () => {
        expect(findKeywordCollisions(table)).toEqual([]);
    });

    it('categorizes common descriptions', () => {
        expect(categorize('TRADER JOE\'S #552', table).category).toBe('Groceries');
        expect(categorize('Monthly rent due', table).category).toBe('Housing');
        expect(categorize('a different plan', table).category).toBe('Uncategorized');
    });
});

describe('keywordTableFromYaml', () => {
    it('reads a wrapped categories mapping and normalizes keywords', () => {
        const table = keywordTableFromYaml(
            'categories:\n  Dining:\n    - Chipotle\n  Groceries:\n    - whole  foods\n',
            'inline'
        );
        expect(keywordTableToEntries(table)).toEqual([
            { category: 'Dining', keywords: ['chipotle'] },
            { category: 'Groceries', keywords: ['whole foods'] },
        ]);
    });

    it('reads a bare category mapping', () => {
        const table = keywordTableFromYaml('Rent:\n  - rent\n', 'inline');
        expect(keywordTableToEntries(table)).toEqual([{ category: 'Rent', keywords: ['rent'] }]);
    });

    it('keeps the order of integer-like category names', () => {
        const table = keywordTableFromYaml('categories:\n  2024: [alpha]\n  10: [beta]\n', 'inline');
        expect(categoryNames(table)).toEqual(['2024', '10']);
    });

    it('reads a list of entries', () => {
        const table = keywordTableFromYaml('- category: Travel\n  keywords: [airline, hotel]\n', 'inline');
        expect(keywordTableToEntries(table)).toEqual([{ category: 'Travel', keywords: ['airline', 'hotel'] }]);
    });

    it('rejects a category whose keywords are not a list', () => {
        expect(() => keywordTableFromYaml('categories:\n  Dining: chipotle\n', 'inline')).toThrow(ConfigError);
        expect(() => keywordTableFromYaml('categories:\n  Dining: chipotle\n', 'inline')).toThrow(
            /^Invalid keyword table/
        );
    });

    it('rejects malformed YAML', () => {
        expect(() => keywordTableFromYaml('categories: [unclosed', 'inline')).toThrow(/^Cannot parse inline/);
    });

    it('rejects an empty file', () => {
        expect(() => keywordTableFromYaml('', 'inline')).toThrow('Keyword file is empty: inline');
    });
});

describe('loadKeywordTable', () => {
    it('reports a missing file', () => {
        expect(() => loadKeywordTable('/nonexistent/keywords.yaml')).toThrow(
            'Keyword file not found: /nonexistent/keywords.yaml'
        );
    });
});
