import { describe, it, expect } from 'vitest';
import { levenshtein, similarity, suggestMatches } from '../../src/utils/fuzzy-match.js';

describe('fuzzy-match utilities', () => {
    describe('levenshtein', () => {
        it('should return 0 for identical strings', () => {
            expect(levenshtein('test', 'test')).toBe(0);
            expect(levenshtein('', '')).toBe(0);
        });

        it('should return length for empty string comparison', () => {
            expect(levenshtein('test', '')).toBe(4);
            expect(levenshtein('', 'test')).toBe(4);
        });

        it('should calculate correct distance for multiple edits', () => {
            expect(levenshtein('kitten', 'sitting')).toBe(3);
        });
    });

    describe('similarity', () => {
        it('should be case-insensitive', () => {
            expect(similarity('Scout', 'SCOUT')).toBe(1);
        });

        it('should return 0 for completely different strings', () => {
            expect(similarity('abc', 'xyz')).toBe(0);
        });
    });

    describe('suggestMatches', () => {
        const names = ['Arcanist', 'Scout', 'Warrior'];

        it('should suggest close names', () => {
            expect(suggestMatches('warior', names)).toEqual(['Warrior']);
            expect(suggestMatches('Scot', names)).toEqual(['Scout']);
        });

        it('should drop names below the threshold', () => {
            expect(suggestMatches('Wizard', names)).toEqual([]);
        });

        it('should rank and limit results', () => {
            expect(suggestMatches('ab', ['abc', 'ab', 'abcd'], 2, 0)).toEqual(['ab', 'abc']);
        });
    });
});
