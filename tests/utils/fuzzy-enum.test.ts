import { describe, it, expect } from 'vitest';
import {
    levenshtein,
    similarity,
    normalizeInput,
    matchAction,
    isGuidingError,
    ratio,
    tokenSortRatio,
    tokenSetRatio,
    partialRatio,
    weightedRatio,
    resolveName
} from '../../src/utils/fuzzy-enum.js';

describe('fuzzy-enum utilities', () => {
    describe('levenshtein', () => {
        it('should return 0 for identical strings', () => {
            expect(levenshtein('test', 'test')).toBe(0);
            expect(levenshtein('', '')).toBe(0);
        });

        it('should return length for empty string comparison', () => {
            expect(levenshtein('test', '')).toBe(4);
            expect(levenshtein('', 'test')).toBe(4);
        });

        it('should calculate correct distance for single edits', () => {
            expect(levenshtein('cat', 'hat')).toBe(1);  // substitution
            expect(levenshtein('cat', 'cats')).toBe(1); // insertion
            expect(levenshtein('cats', 'cat')).toBe(1); // deletion
        });

        it('should calculate correct distance for multiple edits', () => {
            expect(levenshtein('kitten', 'sitting')).toBe(3);
            expect(levenshtein('saturday', 'sunday')).toBe(3);
        });
    });

    describe('similarity', () => {
        it('should return 1 for identical strings', () => {
            expect(similarity('test', 'test')).toBe(1);
        });

        it('should return 0 for completely different strings', () => {
            expect(similarity('abc', 'xyz')).toBe(0);
        });

        it('should be case-insensitive', () => {
            expect(similarity('Validate', 'validate')).toBe(1);
        });
    });

    describe('normalizeInput', () => {
        it('should fold spaces and hyphens to underscores', () => {
            expect(normalizeInput('  Set Race ')).toBe('set_race');
            expect(normalizeInput('add-cantrip')).toBe('add_cantrip');
        });
    });

    describe('matchAction', () => {
        const actions = ['add_cantrip', 'prepare_spell', 'validate'] as const;

        it('should match exactly after normalizing', () => {
            expect(matchAction('Add Cantrip', actions)).toEqual({ matched: 'add_cantrip', exact: true, similarity: 1 });
        });

        it('should resolve aliases at 0.95', () => {
            expect(matchAction('prepare', actions, { prepare: 'prepare_spell' }))
                .toEqual({ matched: 'prepare_spell', exact: false, similarity: 0.95 });
        });

        it('should accept close typos', () => {
            const result = matchAction('validat', actions);
            expect(isGuidingError(result)).toBe(false);
            expect(result).toEqual({ matched: 'validate', exact: false, similarity: 0.875 });
        });

        it('should return a guiding error with suggestions for nonsense', () => {
            const result = matchAction('xyz', actions);
            if (!isGuidingError(result)) throw new Error('expected a guiding error');

            expect(result.error).toBe('invalid_action');
            expect(result.input).toBe('xyz');
            expect(result.suggestions).toHaveLength(3);
            expect(result.message).toMatch(/^Unknown action "xyz"\. Did you mean: /);
        });

        it('should respect a stricter threshold', () => {
            expect(isGuidingError(matchAction('validat', actions, undefined, 0.9))).toBe(true);
        });
    });

    describe('ratios', () => {
        it('should score identical text 100', () => {
            expect(ratio('fire bolt', 'fire bolt')).toBe(100);
        });

        it('should ignore word order in tokenSortRatio', () => {
            expect(tokenSortRatio('bolt fire', 'fire bolt')).toBe(100);
        });

        it('should score a word subset 100 in tokenSetRatio', () => {
            expect(tokenSetRatio('bolt fire', 'fire bolt of doom')).toBe(100);
        });

        it('should find the best window in partialRatio', () => {
            expect(partialRatio('fire', 'fireball')).toBe(100);
        });

        it('should weight and round', () => {
            expect(weightedRatio('Fire Bolt', 'fire bolt')).toBe(100);
            expect(weightedRatio('firebll', 'Fireball')).toBe(88);
            expect(weightedRatio('elv', 'Elf')).toBe(67);
            expect(weightedRatio('', 'Elf')).toBe(0);
        });
    });

    describe('resolveName', () => {
        it('should resolve typos to the canonical name', () => {
            expect(resolveName('firebll', ['Fire Bolt', 'Fireball', 'Light'])).toBe('Fireball');
            expect(resolveName('elv', ['Dwarf', 'Elf', 'Gnome'])).toBe('Elf');
        });

        it('should return null below the cutoff', () => {
            expect(resolveName('qqqq', ['Fire Bolt', 'Fireball', 'Light'])).toBeNull();
        });

        it('should keep candidate order on ties', () => {
            expect(resolveName('abc', ['abc x', 'abc y'])).toBe('abc x');
        });

        it('should honour a custom cutoff', () => {
            expect(resolveName('elv', ['Elf'], 70)).toBeNull();
        });
    });
});
