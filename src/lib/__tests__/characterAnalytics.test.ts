import { describe, it, expect } from 'vitest';
import type { Chapter, CharacterPresence, LoopEntry } from '../../types/analysis';
import { createCharacterRegistry } from '../characterRegistry';
import {
    PLACEHOLDERS,
    buildCharacterContext,
    mentions,
    sampleChapterIndices,
    chapterPageFor,
    buildBeliefShiftMatrix,
    buildDecisionConsequenceChain,
    buildDecisionBeliefLoop,
    classifyArc,
    computeCharacterPresence,
    splitSections,
    computeCharacterInteractions,
    rankSignificantCharacters,
} from '../characterAnalytics';

const registry = createCharacterRegistry({ characters: [{ name: 'Ada', aliases: ['Addie'] }] });
const ada = buildCharacterContext('Ada', registry);

function chapter(number: number, text: string, startOffset = 0): Chapter {
    return { number, text, startOffset };
}

// ─── CONTEXT ───────────────────────────────────────────────────────

describe('mentions', () => {
    it('matches any alias as a whole word, ignoring case', () => {
        expect(mentions('addie smiled', ada)).toBe(true);
        expect(mentions('Adam smiled', ada)).toBe(false);
    });
});

describe('sampleChapterIndices', () => {
    it('keeps every chapter up to eighteen', () => {
        expect(sampleChapterIndices(3)).toEqual([0, 1, 2]);
    });

    it('spreads eighteen samples from first to last', () => {
        const indices = sampleChapterIndices(40);
        expect(indices).toHaveLength(18);
        expect(indices[0]).toBe(0);
        expect(indices[17]).toBe(39);
    });
});

describe('chapterPageFor', () => {
    const mapping = [
        { location: 100, page: 3 },
        { location: 0, page: 1 },
        { location: 40, page: 2 },
    ];

    it('uses the last location at or before the chapter start', () => {
        expect(chapterPageFor(chapter(1, '', 50), mapping)).toBe(2);
    });

    it('falls back to the first page before any location', () => {
        expect(chapterPageFor(chapter(1, '', 0), [{ location: 10, page: 5 }])).toBe(5);
    });

    it('is undefined without a mapping', () => {
        expect(chapterPageFor(chapter(1, ''))).toBeUndefined();
    });
});

// ─── BELIEFS ───────────────────────────────────────────────────────

describe('buildBeliefShiftMatrix', () => {
    const chapters = [
        chapter(
            1,
            'Ada believed in the code. She worked late because the deadline loomed. But the board opposed her.',
        ),
        chapter(2, 'Nobody here.', 120),
    ];

    it('pairs the belief with evidence and counterpressure sentences', () => {
        expect(buildBeliefShiftMatrix(ada, chapters)).toEqual({
            characterName: 'Ada',
            entries: [
                {
                    chapter: 1,
                    coreBelief: 'Ada believed in the code',
                    evidence: 'She worked late because the deadline loomed',
                    counterpressure: 'But the board opposed her',
                },
            ],
        });
    });

    it('adds the chapter page when a mapping is supplied', () => {
        const matrix = buildBeliefShiftMatrix(ada, chapters, [{ location: 0, page: 7 }]);
        expect(matrix.entries[0].chapterPage).toBe(7);
    });

    it('has no entries when the character never appears', () => {
        expect(buildBeliefShiftMatrix(ada, [chapter(1, 'Nobody here.')]).entries).toEqual([]);
    });
});

// ─── DECISIONS ─────────────────────────────────────────────────────

describe('buildDecisionConsequenceChain', () => {
    it('links a decision to its outcome and effect', () => {
        const chain = buildDecisionConsequenceChain(ada, [
            chapter(1, 'Ada decided to leave. The move caused a storm. It changed her.'),
        ]);
        expect(chain.entries).toEqual([
            {
                chapter: 1,
                decision: 'Ada decided to leave',
                immediateOutcome: 'The move caused a storm',
                longTermEffect: 'It changed her',
            },
        ]);
    });

    it('falls back to a placeholder entry on the first chapter', () => {
        const chain = buildDecisionConsequenceChain(ada, [chapter(3, 'Ada slept.')]);
        expect(chain.entries).toEqual([
            {
                chapter: 3,
                decision: PLACEHOLDERS.noDecision,
                immediateOutcome: PLACEHOLDERS.outcome,
                longTermEffect: PLACEHOLDERS.effect,
            },
        ]);
    });

    it('uses chapter one when there are no chapters', () => {
        expect(buildDecisionConsequenceChain(ada, []).entries[0].chapter).toBe(1);
    });
});

// ─── LOOPS ─────────────────────────────────────────────────────────

describe('buildDecisionBeliefLoop', () => {
    it('reads an evolving arc from changing beliefs and shifts', () => {
        const loop = buildDecisionBeliefLoop(ada, [
            chapter(1, 'Ada believed in the code. Ada decided to leave. It changed her.'),
            chapter(2, 'Ada hoped for rain. Ada chose the sea. She learned patience.'),
        ]);
        expect(loop.entries.map(e => [e.beliefInPlay, e.decision, e.beliefShift])).toEqual([
            ['Ada believed in the code', 'Ada decided to leave', 'It changed her'],
            ['Ada hoped for rain', 'Ada chose the sea', 'She learned patience'],
        ]);
        expect(loop.arcQuality).toBe('Evolving Arc - Clear pattern change');
    });
});

describe('classifyArc', () => {
    const entry = (beliefInPlay: string, beliefShift: string): LoopEntry => ({
        chapter: 1,
        pressure: '',
        beliefInPlay,
        decision: '',
        outcome: '',
        beliefShift,
    });

    it('needs two entries', () => {
        expect(classifyArc([entry('a', 'x')])).toBe('Insufficient Data');
    });

    it('calls a repeated belief flat', () => {
        expect(classifyArc([entry('a', 'x'), entry('a', 'x')])).toBe('Flat Arc - Beliefs unchanging');
    });

    it('calls partial change developing', () => {
        expect(classifyArc([entry('a', 'x'), entry('b', 'x')])).toBe('Developing Arc - Some changes');
    });
});

// ─── PRESENCE & INTERACTIONS ───────────────────────────────────────

describe('computeCharacterPresence', () => {
    it('counts case-insensitive mentions per chapter', () => {
        expect(
            computeCharacterPresence(['Ada', 'Bo'], [chapter(1, 'Ada and ada.'), chapter(2, 'Bo')]),
        ).toEqual([
            { characterName: 'Ada', chapterPresence: { 1: 2 } },
            { characterName: 'Bo', chapterPresence: { 2: 1 } },
        ]);
    });
});

describe('splitSections', () => {
    it('groups whitespace tokens and lowercases them', () => {
        expect(splitSections('A b C', 2)).toEqual(['a b', 'c']);
    });
});

describe('computeCharacterInteractions', () => {
    const text = `Ada met Bo. ${'filler '.repeat(1000)}Ada and Bo again. Cy alone.`;

    it('counts shared thousand-word sections, strongest first', () => {
        expect(computeCharacterInteractions(['Ada', 'Bo', 'Cy'], text)).toEqual([
            { character1: 'Ada', character2: 'Bo', coAppearances: 2, sections: [0, 1], relationshipStrength: 1 },
            { character1: 'Ada', character2: 'Cy', coAppearances: 1, sections: [1], relationshipStrength: 0.5 },
            { character1: 'Bo', character2: 'Cy', coAppearances: 1, sections: [1], relationshipStrength: 0.5 },
        ]);
    });

    it('needs two names', () => {
        expect(computeCharacterInteractions(['Ada'], text)).toEqual([]);
    });
});

describe('rankSignificantCharacters', () => {
    it('ranks by total mentions and pads to five', () => {
        const presence: CharacterPresence[] = [
            { characterName: 'A', chapterPresence: { 1: 5 } },
            { characterName: 'B', chapterPresence: { 1: 1 } },
            { characterName: 'C', chapterPresence: {} },
        ];
        expect(rankSignificantCharacters(presence, [])).toEqual(['A', 'B']);
    });

    it('falls back to interaction totals when nobody is mentioned', () => {
        const presence = [{ characterName: 'A', chapterPresence: {} }];
        const interactions = [
            { character1: 'A', character2: 'B', coAppearances: 1, sections: [0], relationshipStrength: 1 },
            { character1: 'B', character2: 'C', coAppearances: 2, sections: [0, 1], relationshipStrength: 1 },
        ];
        expect(rankSignificantCharacters(presence, interactions)).toEqual(['B', 'C', 'A']);
    });
});
