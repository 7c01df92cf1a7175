import { describe, it, expect } from 'vitest';
import { tokenizePoemWords } from '../segmentation';
import {
    type Poem,
    readPoem,
    topCounted,
    isEnjambed,
    hasCaesura,
    rhymeKey,
    rhymeScheme,
    analyzeFormal,
    analyzeImagery,
    analyzeVoice,
    scoreLine,
    stanzaOfLine,
    analyzeEmotion,
    analyzeMotifs,
    analyzeStructure,
    classifyMode,
    overlap,
    sensesByThird,
    collectCraftSignals,
    poemWordCount,
    analyzePoetry,
} from '../poetry';

/** Build a poem directly, skipping header detection */
function poemOf(stanzas: string[][]): Poem {
    const lines = stanzas.flat();
    return { stanzas, lines, tokensByLine: lines.map(tokenizePoemWords) };
}

const QUATRAIN = [
    'I wore a crooked hat,',
    'The moon was very bright;',
    'You laughed at all of that,',
    'And we walked into the night.',
].join('\n');

// ─── READING ───────────────────────────────────────────────────────

describe('readPoem', () => {
    it('splits stanzas and tokenises each line', () => {
        const poem = readPoem('one line,\ntwo line.');
        expect(poem.stanzas).toEqual([['one line,', 'two line.']]);
        expect(poem.tokensByLine).toEqual([
            ['one', 'line'],
            ['two', 'line'],
        ]);
        expect(poemWordCount(poem)).toBe(4);
    });
});

describe('topCounted', () => {
    it('sorts by count then text and applies the minimum', () => {
        const counts = new Map([
            ['b', 2],
            ['a', 2],
            ['c', 3],
            ['d', 1],
        ]);
        expect(topCounted(counts, 2, 2)).toEqual([
            { text: 'c', count: 3 },
            { text: 'a', count: 2 },
        ]);
    });
});

// ─── FORMAL FEATURES ───────────────────────────────────────────────

describe('line endings', () => {
    it('treats lines without closing punctuation as enjambed', () => {
        expect(isEnjambed('and then')).toBe(true);
        expect(isEnjambed('stop.')).toBe(false);
        expect(isEnjambed('   ')).toBe(false);
    });

    it('finds a pause in the first half of the line', () => {
        expect(hasCaesura('Stop, and listen now')).toBe(true);
        expect(hasCaesura('no pause here at all')).toBe(false);
    });

    it('measures the pause against the indented line text', () => {
        expect(hasCaesura(' '.repeat(30) + 'Stop, and listen to the rain')).toBe(true);
        expect(hasCaesura('      ')).toBe(false);
    });
});

describe('rhymeScheme', () => {
    it('keys lines by the last three letters', () => {
        expect(rhymeKey('The moon was very bright;')).toBe('ght');
        expect(rhymeKey('!!!')).toBe('-');
    });

    it('letters each new ending in order', () => {
        expect(rhymeScheme(['a hat,', 'the bright', 'like that', 'the night.'])).toBe('ABAB');
        expect(rhymeScheme(['a hat', '...'])).toBe('A-');
    });

    it('never reuses a letter past the alphabet', () => {
        const stanza = Array.from(
            { length: 28 },
            (_, i) => `line ends q${String.fromCharCode(97 + Math.floor(i / 26))}${String.fromCharCode(97 + (i % 26))}`,
        );
        const scheme = rhymeScheme(stanza);
        expect(scheme).toHaveLength(28);
        expect(new Set(scheme).size).toBe(28);
        expect(scheme.slice(0, 26)).toBe('ABCDEFGHIJKLMNOPQRSTUVWXYZ');
    });
});

describe('analyzeFormal', () => {
    it('measures lengths, closure, rhyme and repetition', () => {
        expect(analyzeFormal(poemOf([['Cold wind, cold wind', 'cold rain falls']]))).toEqual({
            lineCount: 2,
            stanzaCount: 1,
            averageLineLength: 18,
            lineLengthStdDev: 3.536,
            enjambmentRate: 1,
            caesuraRate: 0.5,
            rhymeSchemeByStanza: ['AB'],
            repetitions: [
                { text: 'cold', count: 3 },
                { text: 'wind', count: 2 },
            ],
            anaphora: [{ text: 'cold', count: 2 }],
            alliterationExamples: [],
        });
    });

    it('reports runs of repeated initials', () => {
        const formal = analyzeFormal(poemOf([['silver sea sings', 'nothing']]));
        expect(formal.alliterationExamples).toEqual(["Line 1: repeated initial 's' (3×)"]);
    });
});

// ─── IMAGERY & VOICE ───────────────────────────────────────────────

describe('analyzeImagery', () => {
    it('counts sense words and names the two strongest senses', () => {
        const imagery = analyzeImagery(poemOf([['I saw the bright light', 'and heard a soft song']]));
        expect(imagery.senseCounts).toEqual({
            visual: 3,
            auditory: 2,
            tactile: 1,
            olfactory: 0,
            gustatory: 0,
            kinesthetic: 0,
        });
        expect(imagery.dominantSenses).toEqual(['visual', 'auditory']);
        expect(imagery.topSensoryWords.map(w => w.text)).toEqual([
            'bright',
            'heard',
            'light',
            'saw',
            'soft',
            'song',
        ]);
    });
});

describe('analyzeVoice', () => {
    it('detects address and a turn word', () => {
        expect(analyzeVoice(poemOf([['You said you would stay.', 'But I left?']]))).toEqual({
            firstPersonPronouns: 1,
            secondPersonPronouns: 2,
            thirdPersonPronouns: 0,
            questions: 1,
            exclamations: 0,
            hedges: [],
            modality: [],
            likelyAddressMode: 'Address (speaker → you)',
            candidateVoltaLine: 2,
        });
    });

    it('falls back to a first-person stance', () => {
        expect(analyzeVoice(readPoem(QUATRAIN)).likelyAddressMode).toBe(
            'First-person stance (speaker-centered)',
        );
    });
});

// ─── EMOTION ───────────────────────────────────────────────────────

describe('scoreLine', () => {
    it('balances positive against negative words', () => {
        expect(scoreLine('warm but cold', ['warm', 'but', 'cold'])).toBe(0);
    });

    it('amplifies exclamations and intensifiers within the unit range', () => {
        expect(scoreLine('love and joy!', ['love', 'and', 'joy'])).toBe(1);
        expect(scoreLine('so sad', ['so', 'sad'])).toBe(-1);
    });
});

describe('analyzeEmotion', () => {
    const poem = poemOf([['love', 'grief'], ['light']]);

    it('scores lines and stanzas and finds the extremes', () => {
        const emotion = analyzeEmotion(poem);
        expect(emotion).toEqual({
            lineScores: [1, -1, 1],
            stanzaScores: [0, 1],
            peakLine: 1,
            troughLine: 2,
            peakStanza: 2,
            troughStanza: 1,
            volatility: 2,
            shiftLines: [1, 2],
            shiftStanzas: [1],
        });
    });

    it('adds the turn line and its stanza to the shifts', () => {
        const emotion = analyzeEmotion(poem, 3);
        expect(emotion.shiftLines).toEqual([1, 2, 3]);
        expect(emotion.shiftStanzas).toEqual([1, 2]);
    });

    it('maps lines to stanzas', () => {
        expect(stanzaOfLine([2, 1], 3)).toBe(2);
        expect(stanzaOfLine([2, 1], 5)).toBeUndefined();
    });
});

// ─── MOTIFS, STRUCTURE & MODE ──────────────────────────────────────

describe('analyzeMotifs', () => {
    it('counts recurring content words and adjacent pairs', () => {
        expect(analyzeMotifs(poemOf([['cold wind cold wind', 'cold rain']]))).toEqual({
            topMotifs: [
                { text: 'cold', count: 3 },
                { text: 'wind', count: 2 },
            ],
            topBigrams: [{ text: 'cold wind', count: 2 }],
        });
    });
});

describe('analyzeStructure', () => {
    it('reports the first longest and shortest stanza', () => {
        expect(analyzeStructure(poemOf([['a', 'b'], ['c'], ['d', 'e']]))).toEqual({
            stanzaLineCounts: [2, 1, 2],
            longestStanzaIndex: 0,
            shortestStanzaIndex: 1,
        });
    });
});

describe('classifyMode', () => {
    it('reads event markers as narrative', () => {
        const poem = poemOf([
            ['Then he walked and ran and went', 'then came and said and told', 'after they turned and gave'],
        ]);
        expect(classifyMode(poem).mode).toBe('narrative');
    });

    it('reads questions and abstractions as contemplative', () => {
        const poem = poemOf([['Why do I think of time?', 'What is truth?', 'I wonder at the soul?']]);
        expect(classifyMode(poem).mode).toBe('contemplative');
    });

    it('reads address with reflection as lyric', () => {
        expect(classifyMode(poemOf([['O you, my soul, still']])).mode).toBe('lyric');
    });

    it('calls a balanced poem hybrid', () => {
        expect(classifyMode(poemOf([['a stone']])).mode).toBe('hybrid');
    });
});

// ─── CRAFT SIGNALS ─────────────────────────────────────────────────

describe('overlap', () => {
    it('is the Jaccard index of two token sets', () => {
        expect(overlap(['a', 'b'], ['b', 'c'])).toBeCloseTo(1 / 3, 10);
        expect(overlap([], [])).toBe(0);
    });
});

describe('sensesByThird', () => {
    it('reads the dominant sense of each third', () => {
        expect(sensesByThird([['light'], ['song'], ['honey']])).toEqual([
            ['visual'],
            ['auditory'],
            ['gustatory'],
        ]);
    });
});

describe('collectCraftSignals', () => {
    it('measures how the ending returns to the opening', () => {
        const poem = poemOf([['cold wind here'], ['the cold wind']]);
        const signals = collectCraftSignals(poem, {
            mode: classifyMode(poem).mode,
            formal: analyzeFormal(poem),
            imagery: analyzeImagery(poem),
            voice: analyzeVoice(poem),
            emotion: analyzeEmotion(poem),
            motif: analyzeMotifs(poem),
            structure: analyzeStructure(poem),
        });
        expect(signals.openingClosingOverlap).toBe(1);
        expect(signals.endingMotifs).toEqual(['cold', 'wind']);
        expect(signals.lastLineTokens).toEqual(['the', 'cold', 'wind']);
        expect(signals.thirds).toEqual([['tactile'], ['tactile'], ['tactile']]);
        expect(signals.expositionCount).toBe(0);
    });
});

// ─── ENTRY POINT ───────────────────────────────────────────────────

describe('analyzePoetry', () => {
    it('returns nothing for an empty poem', () => {
        expect(analyzePoetry(poemOf([]))).toBeUndefined();
    });

    it('reads an alternating rhyme in a single quatrain', () => {
        const insights = analyzePoetry(readPoem(QUATRAIN));
        expect(insights?.formal.rhymeSchemeByStanza).toEqual(['ABAB']);
        expect(insights?.formal.lineCount).toBe(4);
        expect(insights?.writers.formContext).toBe('stanzaic lyric');
    });
});
