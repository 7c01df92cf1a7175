import { describe, it, expect, vi } from 'vitest';
import { analyze, analyzeText } from '../analysisEngine';
import { createCharacterRegistry } from '../characterRegistry';

const QUATRAIN = [
    'I wore a crooked hat,',
    'The moon was very bright;',
    'You laughed at all of that,',
    'And we walked into the night.',
].join('\n');

// ─── PROSE ─────────────────────────────────────────────────────────

describe('analyze: prose', () => {
    it('counts and flags a single sentence', () => {
        const results = analyze('The ball was kicked quickly.');
        expect(results.wordCount).toBe(5);
        expect(results.sentenceCount).toBe(1);
        expect(results.paragraphCount).toBe(1);
        expect(results.pageCount).toBe(1);
        expect(results.passiveVoicePhrases).toEqual(['was kicked']);
        expect(results.adverbPhrases).toEqual(['quickly']);
        expect(results.documentFormat).toBe('novel');
        expect(results.truncated).toBe(false);
        expect(results.warnings).toEqual([]);
        expect(results.poetryInsights).toBeUndefined();
    });

    it('measures the share of quoted words', () => {
        expect(analyze('He said "hi there" loudly.').dialoguePercentage).toBe(40);
    });

    it('returns zeroed results for empty input', () => {
        const results = analyze('');
        expect(results.wordCount).toBe(0);
        expect(results.sentenceCount).toBe(0);
        expect(results.pageCount).toBe(0);
        expect(results.readingLevel).toBe('--');
        expect(results.plotAnalysis).toBeUndefined();
        expect(results.analyzedCharacters).toEqual([]);
    });

    it('gives the same results for the same input', () => {
        const text = 'She believed the storm would pass. It did not.';
        expect(analyzeText(text)).toEqual(analyzeText(text));
    });
});

// ─── TRUNCATION ────────────────────────────────────────────────────

describe('analyze: truncation', () => {
    it('analyses a prefix but keeps the full word count', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const results = analyze('one two three four', { maxAnalysisLength: 7 });

        expect(results.truncated).toBe(true);
        expect(results.wordCount).toBe(4);
        expect(results.warnings).toEqual([
            { code: 'input-truncated', message: 'Only the first 7 of 18 characters were analysed.' },
        ]);
        expect(warn).toHaveBeenCalledWith('[Analysis] Input truncated from 18 to 7 characters');
    });

    it('ignores a non-positive limit', () => {
        expect(analyze('one two', { maxAnalysisLength: 0 }).truncated).toBe(false);
    });
});

// ─── FORMAT ────────────────────────────────────────────────────────

describe('analyze: format', () => {
    it('uses an injected detector for prose', () => {
        const detectFormat = vi.fn(() => ({ format: 'screenplay' as const, confidence: 0.8 }));
        const results = analyze('He walks in. She runs out.', { formatDetector: { detectFormat } });

        expect(detectFormat).toHaveBeenCalledWith('He walks in. She runs out.');
        expect(results.documentFormat).toBe('screenplay');
        expect(results.plotAnalysis?.formatConfidence).toBe(0.8);
    });

    it('skips detection when the style is screenplay', () => {
        const detectFormat = vi.fn(() => ({ format: 'novel' as const, confidence: 1 }));
        const results = analyze('He walks in.', { style: 'screenplay', formatDetector: { detectFormat } });

        expect(detectFormat).not.toHaveBeenCalled();
        expect(results.documentFormat).toBe('screenplay');
        expect(results.plotAnalysis?.formatConfidence).toBe(1);
    });
});

// ─── POETRY ────────────────────────────────────────────────────────

describe('analyze: poetry', () => {
    it('reads the poem instead of running plot analysis', () => {
        const results = analyze(QUATRAIN, { style: 'poetry' });
        expect(results.poetryInsights?.formal.rhymeSchemeByStanza).toEqual(['ABAB']);
        expect(results.plotAnalysis).toBeUndefined();
        expect(results.documentFormat).toBe('novel');
        expect(results.wordCount).toBe(22);
        expect(results.dialogueSegmentCount).toBe(0);
        expect(results.warnings).toEqual([]);
    });

    it('counts the whole poem when only a prefix is read', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        const results = analyze(QUATRAIN, { style: 'poetry', maxAnalysisLength: 21 });

        expect(results.truncated).toBe(true);
        expect(results.wordCount).toBe(22);
        expect(results.warnings.map(w => w.code)).toEqual(['input-truncated', 'insufficient-poetry-content']);
    });

    it('warns when there is too little to read', () => {
        const results = analyze('A single line', { style: 'poetry' });
        expect(results.warnings).toEqual([
            {
                code: 'insufficient-poetry-content',
                message: 'Poetry analysis needs at least 2 lines; found 1.',
            },
        ]);
    });
});

// ─── CHARACTERS ────────────────────────────────────────────────────

describe('analyze: characters', () => {
    it('resolves requested names through the registry', () => {
        const characterRegistry = createCharacterRegistry({
            characters: [{ name: 'Ada', aliases: ['Addie'] }, { name: 'Bo' }],
        });
        const results = analyze('Addie smiled. Ada left.', {
            characterRegistry,
            characterNames: ['addie', 'Nobody'],
        });

        expect(results.analyzedCharacters).toEqual(['Ada']);
        expect(results.beliefShiftMatrices.map(m => m.characterName)).toEqual(['Ada']);
        expect(results.languageDriftData).toHaveLength(1);
    });

    it('analyses nobody without a registry, names or opt-in', () => {
        expect(analyze('Mara ran. Mara hid. Mara slept.').analyzedCharacters).toEqual([]);
    });
});
