import { describe, it, expect } from 'vitest';
import {
    LexiconError,
    requireWords,
    compilePattern,
    escapeRegExp,
    NOVEL_KEY_BEATS,
    NOVEL_POINT_TYPES,
    SENTIMENT_LEXICON,
} from '../lexicons';

// ─── VALIDATION ────────────────────────────────────────────────────

describe('requireWords', () => {
    it('passes a usable list through', () => {
        expect(requireWords('colors', ['red', 'blue'])).toEqual(['red', 'blue']);
    });

    it('rejects empty lists and blank entries', () => {
        expect(() => requireWords('colors', [])).toThrow('Lexicon "colors" is invalid: list is empty');
        expect(() => requireWords('colors', ['red', '  '])).toThrow(LexiconError);
    });
});

describe('compilePattern', () => {
    it('wraps regex syntax errors in a LexiconError', () => {
        expect(() => compilePattern('broken', '(', 'g')).toThrow(LexiconError);
        expect(compilePattern('ok', 'a+', 'g').flags).toBe('g');
    });
});

describe('escapeRegExp', () => {
    it('escapes regex metacharacters', () => {
        expect(escapeRegExp('a.b*(c)')).toBe('a\\.b\\*\\(c\\)');
    });
});

// ─── LOADED TABLES ─────────────────────────────────────────────────

describe('plot tables', () => {
    it('orders point types by ascending bound', () => {
        const bounds = NOVEL_POINT_TYPES.map(t => t.upperBound);
        expect([...bounds].sort((a, b) => a - b)).toEqual(bounds);
    });

    it('resolves key beats to their point types', () => {
        expect(NOVEL_KEY_BEATS.map(t => t.name)).toEqual([
            'Inciting Disruption',
            'Midpoint Reversal',
            'Crisis / Lowest Point',
            'Climax',
        ]);
    });
});

describe('SENTIMENT_LEXICON', () => {
    it('holds only non-zero scores', () => {
        expect([...SENTIMENT_LEXICON.values()].every(v => v !== 0)).toBe(true);
    });
});
