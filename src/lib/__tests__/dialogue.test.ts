import { describe, it, expect } from 'vitest';
import {
    extractQuotedDialogue,
    extractScreenplayDialogue,
    extractDialogue,
    isCharacterCue,
    isSceneHeading,
    isTransition,
    detectRepetition,
    findPredictablePhrases,
    countExposition,
    dialoguePacing,
    tagVariety,
    scoreDialogueQuality,
    EMPTY_DIALOGUE_QUALITY,
} from '../dialogue';

const SCENE = [
    'INT. KITCHEN - DAY',
    '',
    'JOHN',
    'Hello there.',
    'How are you?',
    '',
    'MARY (V.O.)',
    'Fine.',
    'CUT TO:',
    '',
].join('\n');

// ─── PROSE ─────────────────────────────────────────────────────────

describe('extractQuotedDialogue', () => {
    it('collects text between straight and curly quotes', () => {
        expect(extractQuotedDialogue('She said, "Hello there." Then “Go home.”')).toEqual([
            'Hello there.',
            'Go home.',
        ]);
    });

    it('returns nothing without quotes or when a quote never closes', () => {
        expect(extractQuotedDialogue('No quotes here.')).toEqual([]);
        expect(extractQuotedDialogue('"never closed')).toEqual([]);
    });
});

// ─── SCREENPLAY ────────────────────────────────────────────────────

describe('screenplay line classification', () => {
    it('recognises scene headings and transitions', () => {
        expect(isSceneHeading('int. hallway - night')).toBe(true);
        expect(isTransition('CUT TO:')).toBe(true);
        expect(isTransition('FADE IN')).toBe(true);
    });

    it('accepts uppercase cues with extensions', () => {
        expect(isCharacterCue('JOHN')).toBe(true);
        expect(isCharacterCue('MARY (V.O.)')).toBe(true);
    });

    it('rejects mixed case, headings and transitions as cues', () => {
        expect(isCharacterCue('John')).toBe(false);
        expect(isCharacterCue('INT. KITCHEN - DAY')).toBe(false);
        expect(isCharacterCue('FADE IN')).toBe(false);
    });
});

describe('extractScreenplayDialogue', () => {
    it('joins the lines under each cue until a blank or transition', () => {
        expect(extractScreenplayDialogue(SCENE)).toEqual(['Hello there. How are you?', 'Fine.']);
    });
});

describe('extractDialogue', () => {
    it('falls back to quotes when a screenplay has no cues', () => {
        expect(extractDialogue('He said "fine" and left.', true)).toEqual(['fine']);
    });

    it('ignores cues for prose', () => {
        expect(extractDialogue(SCENE, false)).toEqual([]);
    });
});

// ─── CHECKS ────────────────────────────────────────────────────────

describe('detectRepetition', () => {
    it('needs more than five segments', () => {
        expect(detectRepetition(['Go.', 'Go.', 'Go.'])).toEqual({ repeated: false, score: 0 });
    });

    it('counts lines said more than twice, ignoring edge punctuation', () => {
        expect(detectRepetition(['Go.', 'Go.', 'go', 'x', 'y', 'z'])).toEqual({
            repeated: true,
            score: 16,
        });
    });
});

describe('findPredictablePhrases', () => {
    it('returns phrases in lexicon order without duplicates', () => {
        expect(findPredictablePhrases(['Trust me, I can explain.', 'Trust me.'])).toEqual([
            'i can explain',
            'trust me',
        ]);
    });
});

describe('countExposition', () => {
    it('counts long statements only', () => {
        const long = 'a'.repeat(101);
        expect(countExposition([long, `${long}?`, 'short'])).toBe(1);
    });
});

describe('dialoguePacing', () => {
    it('scales the deviation of segment lengths', () => {
        expect(dialoguePacing(['x'.repeat(10), 'x'.repeat(70)])).toBe(100);
        expect(dialoguePacing(['only'])).toBe(0);
    });
});

describe('tagVariety', () => {
    it('counts distinct attribution verbs in the full text', () => {
        expect(tagVariety('He said and she asked, then whispered. He said again.')).toBe(3);
    });
});

// ─── QUALITY SCORE ─────────────────────────────────────────────────

describe('scoreDialogueQuality', () => {
    it('awards ten points per passing check', () => {
        expect(scoreDialogueQuality(['Hi.', 'No!'], 'Hi. No!')).toEqual({
            qualityScore: 40,
            segmentCount: 2,
            fillerCount: 0,
            repetitionScore: 0,
            tagVariety: 0,
            predictablePhrases: [],
            expositionCount: 0,
            pacingScore: 0,
            hasConflict: true,
        });
    });

    it('returns the empty result without segments', () => {
        expect(scoreDialogueQuality([], 'Narration only.')).toEqual(EMPTY_DIALOGUE_QUALITY);
    });
});
