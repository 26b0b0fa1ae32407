import { describe, it, expect } from 'vitest';
import { compileKeyword, matchesKeyword } from '../../src/categorizer/match.js';

function matches(description: string, keyword: string): boolean {
    return matchesKeyword(description, compileKeyword(keyword));
}

describe('compileKeyword', () => {
    describe('word boundaries', () => {
        it('matches a whole word', () => {
            expect(matches('rent due', 'rent')).toBe(true);
        });

        it('does not match inside a longer word', () => {
            expect(matches('a different plan', 'rent')).toBe(false);
            expect(matches('rental car', 'rent')).toBe(false);
            expect(matches('parent teacher', 'rent')).toBe(false);
        });

        it('treats punctuation as a boundary', () => {
            expect(matches('pos*rent#1234', 'rent')).toBe(true);
            expect(matches('(rent)', 'rent')).toBe(true);
        });

        it('treats digits as part of a word', () => {
            expect(matches('rent2024', 'rent')).toBe(false);
        });

        it('matches at both ends of the description', () => {
            expect(matches('rent', 'rent')).toBe(true);
            expect(matches('monthly rent', 'rent')).toBe(true);
        });
    });

    describe('phrases', () => {
        it('matches a multi-word phrase', () => {
            expect(matches('whole foods market #10', 'whole foods')).toBe(true);
        });

        it('allows any whitespace between the words', () => {
            expect(matches('whole   foods', 'whole foods')).toBe(true);
            expect(matches('whole\tfoods', 'whole foods')).toBe(true);
        });

        it('requires boundaries on both ends of the phrase', () => {
            expect(matches('wholesale foods', 'whole foods')).toBe(false);
            expect(matches('whole foodsmart', 'whole foods')).toBe(false);
        });
    });

    describe('special characters', () => {
        it('matches keywords containing regex syntax literally', () => {
            expect(matches('disney+ monthly', 'disney+')).toBe(true);
            expect(matches('disneyy monthly', 'disney+')).toBe(false);
            expect(matches('payment to at&t', 'at&t')).toBe(true);
            expect(matches('amazon.com order', 'amazon.com')).toBe(true);
            expect(matches('amazonxcom order', 'amazon.com')).toBe(false);
        });

        it('matches hyphenated keywords', () => {
            expect(matches('7-eleven #221', '7-eleven')).toBe(true);
        });
    });

    it('is case-insensitive', () => {
        expect(matches('RENT DUE', 'rent')).toBe(true);
    });

    it('does not treat accented letters as boundaries', () => {
        expect(matches('café', 'caf')).toBe(false);
    });
});
