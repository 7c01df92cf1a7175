import { describe, it, expect } from 'vitest';
import {
    dedupeExamples,
    detectPassiveVoice,
    detectAdverbs,
    detectWeakVerbs,
    detectFilterWords,
    detectCliches,
    countSensoryDetails,
    isMissingSensoryDetail,
} from '../detectors';
import { tokenizeWords } from '../segmentation';

// ─── EXAMPLES ──────────────────────────────────────────────────────

describe('dedupeExamples', () => {
    it('keeps first occurrences case-insensitively up to the limit', () => {
        expect(dedupeExamples(['A', 'a', 'b', 'c'], 2)).toEqual(['A', 'b']);
    });
});

// ─── PASSIVE VOICE ─────────────────────────────────────────────────

describe('detectPassiveVoice', () => {
    it('matches regular and irregular participles', () => {
        const result = detectPassiveVoice('The ball was kicked. The letter was written by her.');
        expect(result.count).toBe(2);
        expect(result.examples).toEqual(['was kicked', 'was written']);
    });

    it('finds nothing in active prose', () => {
        expect(detectPassiveVoice('She kicked the ball.')).toEqual({ count: 0, examples: [] });
    });
});

// ─── TOKEN DETECTORS ───────────────────────────────────────────────

describe('detectAdverbs', () => {
    it('counts -ly words but skips the exception list', () => {
        const result = detectAdverbs(tokenizeWords('She quickly and quietly left. Only lovely.'));
        expect(result).toEqual({ count: 2, examples: ['quickly', 'quietly'] });
    });
});

describe('detectWeakVerbs', () => {
    it('counts every weak verb occurrence', () => {
        const result = detectWeakVerbs(tokenizeWords('He was tired and had gone. He was.'));
        expect(result.count).toBe(4);
        expect(result.examples).toEqual(['was', 'had', 'gone']);
    });
});

describe('detectFilterWords', () => {
    it('flags perception verbs', () => {
        expect(detectFilterWords(tokenizeWords('I saw it and felt cold.'))).toEqual({
            count: 2,
            examples: ['saw', 'felt'],
        });
    });
});

// ─── PHRASES ───────────────────────────────────────────────────────

describe('detectCliches', () => {
    it('counts distinct clichés, not occurrences', () => {
        const result = detectCliches(
            'At the end of the day, her heart raced. At the end of the day.',
        );
        expect(result).toEqual({ count: 2, examples: ['at the end of the day', 'heart raced'] });
    });
});

describe('countSensoryDetails', () => {
    it('matches sensory stems with suffixes', () => {
        expect(countSensoryDetails('The bright light looked warm.')).toBe(3);
    });
});

describe('isMissingSensoryDetail', () => {
    it('expects one sensory word per fifty words', () => {
        expect(isMissingSensoryDetail(100, 1)).toBe(true);
        expect(isMissingSensoryDetail(100, 2)).toBe(false);
    });

    it('expects at least one for short texts', () => {
        expect(isMissingSensoryDetail(10, 0)).toBe(true);
    });

    it('never flags empty text', () => {
        expect(isMissingSensoryDetail(0, 0)).toBe(false);
    });
});
