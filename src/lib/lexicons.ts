/**
 * lexicons.ts — Word lists and phrase tables used by the detectors
 *
 * Loaded once from src/data/*.json and frozen into Sets. A malformed table
 * throws at import time rather than silently producing empty results.
 */

import detectorData from '../data/detectorLexicons.json';
import dialogueData from '../data/dialogueLexicons.json';
import characterData from '../data/characterLexicons.json';
import poetryData from '../data/poetryLexicons.json';
import plotData from '../data/plotLexicons.json';

export class LexiconError extends Error {
    constructor(table: string, reason: string) {
        super(`Lexicon "${table}" is invalid: ${reason}`);
        this.name = 'LexiconError';
    }
}

// ═══════════════════════════════════════════════════════════
// 1. VALIDATION
// ═══════════════════════════════════════════════════════════

export function requireWords(table: string, words: readonly string[]): readonly string[] {
    if (words.length === 0) throw new LexiconError(table, 'list is empty');
    for (const w of words) {
        if (w.trim().length === 0) throw new LexiconError(table, 'contains a blank entry');
    }
    return words;
}

function toSet(table: string, words: readonly string[]): ReadonlySet<string> {
    return new Set(requireWords(table, words));
}

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compilePattern(table: string, source: string, flags: string): RegExp {
    try {
        return new RegExp(source, flags);
    } catch (err) {
        throw new LexiconError(table, err instanceof Error ? err.message : String(err));
    }
}

// ═══════════════════════════════════════════════════════════
// 2. PROSE DETECTORS
// ═══════════════════════════════════════════════════════════

const BE_VERBS = '\\b(?:am|is|are|was|were|be|been|being)\\b';

export const PASSIVE_PATTERNS: readonly RegExp[] = [
    compilePattern('passive', `${BE_VERBS}\\s+\\w+ed\\b`, 'gi'),
    compilePattern('passive', `${BE_VERBS}\\s+being\\s+\\w+ed\\b`, 'gi'),
    compilePattern(
        'passive',
        `${BE_VERBS}\\s+(?:${requireWords('passiveIrregularParticiples', detectorData.passiveIrregularParticiples).join('|')})\\b`,
        'gi',
    ),
];

export const ADVERB_EXCEPTIONS = toSet('adverbExceptions', detectorData.adverbExceptions);
export const WEAK_VERBS = toSet('weakVerbs', detectorData.weakVerbs);
export const FILTER_WORDS = toSet('filterWords', detectorData.filterWords);
export const CLICHES = requireWords('cliches', detectorData.cliches);

const sensoryStems = Object.values(detectorData.sensoryWords).flat();
export const SENSORY_PATTERN = compilePattern(
    'sensoryWords',
    `\\b(${requireWords('sensoryWords', sensoryStems).map(escapeRegExp).join('|')})\\w*\\b`,
    'gi',
);

// ═══════════════════════════════════════════════════════════
// 3. DIALOGUE
// ═══════════════════════════════════════════════════════════

export const DIALOGUE_FILLERS = requireWords('fillers', dialogueData.fillers);
export const DIALOGUE_TAGS = requireWords('tags', dialogueData.tags);
export const PREDICTABLE_PHRASES = requireWords('predictablePhrases', dialogueData.predictablePhrases);
export const CONFLICT_WORDS = requireWords('conflictWords', dialogueData.conflictWords);
export const SCREENPLAY_TRANSITIONS = requireWords(
    'screenplayTransitionPrefixes',
    dialogueData.screenplayTransitionPrefixes,
);

// ═══════════════════════════════════════════════════════════
// 4. CHARACTERS
// ═══════════════════════════════════════════════════════════

export const BELIEF_INDICATORS = requireWords('beliefIndicators', characterData.beliefIndicators);
export const EVIDENCE_INDICATORS = requireWords('evidenceIndicators', characterData.evidenceIndicators);
export const COUNTERPRESSURE_INDICATORS = requireWords(
    'counterpressureIndicators',
    characterData.counterpressureIndicators,
);
export const DECISION_INDICATORS = requireWords('decisionIndicators', characterData.decisionIndicators);
export const OUTCOME_INDICATORS = requireWords('outcomeIndicators', characterData.outcomeIndicators);
export const EFFECT_INDICATORS = requireWords('effectIndicators', characterData.effectIndicators);
export const NAME_EXCLUSIONS = toSet('nameExclusions', characterData.nameExclusions);

export const DRIFT_WORDS = {
    pronounI: toSet('drift.pronounI', characterData.drift.pronounI),
    pronounWe: toSet('drift.pronounWe', characterData.drift.pronounWe),
    obligation: toSet('drift.obligation', characterData.drift.obligation),
    choice: toSet('drift.choice', characterData.drift.choice),
    certainty: toSet('drift.certainty', characterData.drift.certainty),
    hedges: toSet('drift.hedges', characterData.drift.hedges),
};

export const ALIGNMENT_WORDS = {
    interiority: toSet('alignment.interiority', characterData.alignment.interiority),
    outward: toSet('alignment.outward', characterData.alignment.outward),
    masking: toSet('alignment.masking', characterData.alignment.masking),
};

export const DOMINANCE_VERBS = toSet('relationship.dominance', characterData.relationship.dominance);
export const NEGATIONS = toSet('negations', characterData.negations);

export const SENTIMENT_LEXICON: ReadonlyMap<string, number> = (() => {
    const entries = Object.entries(characterData.sentiment);
    if (entries.length === 0) throw new LexiconError('sentiment', 'lexicon is empty');
    for (const [word, score] of entries) {
        if (!Number.isFinite(score) || score === 0) {
            throw new LexiconError('sentiment', `"${word}" has no usable score`);
        }
    }
    return new Map(entries);
})();

// ═══════════════════════════════════════════════════════════
// 5. POETRY
// ═══════════════════════════════════════════════════════════

export const POETRY_STOPWORDS = toSet('poetry.stopwords', poetryData.stopwords);

export const IMAGERY_LEXICON = {
    visual: toSet('imagery.visual', poetryData.imagery.visual),
    auditory: toSet('imagery.auditory', poetryData.imagery.auditory),
    tactile: toSet('imagery.tactile', poetryData.imagery.tactile),
    olfactory: toSet('imagery.olfactory', poetryData.imagery.olfactory),
    gustatory: toSet('imagery.gustatory', poetryData.imagery.gustatory),
    kinesthetic: toSet('imagery.kinesthetic', poetryData.imagery.kinesthetic),
};

export const VOICE_LEXICON = {
    firstPerson: toSet('voice.firstPerson', poetryData.voice.firstPerson),
    secondPerson: toSet('voice.secondPerson', poetryData.voice.secondPerson),
    thirdPerson: toSet('voice.thirdPerson', poetryData.voice.thirdPerson),
    narrativeVerbs: toSet('voice.narrativeVerbs', poetryData.voice.narrativeVerbs),
    hedges: toSet('voice.hedges', poetryData.voice.hedges),
    modality: toSet('voice.modality', poetryData.voice.modality),
    voltaCues: toSet('voice.voltaCues', poetryData.voice.voltaCues),
};

export const EMOTION_LEXICON = {
    positive: toSet('emotion.positive', poetryData.emotion.positive),
    negative: toSet('emotion.negative', poetryData.emotion.negative),
    intensifiers: toSet('emotion.intensifiers', poetryData.emotion.intensifiers),
};

export const MODE_LEXICON = {
    narrativeMarkers: toSet('mode.narrativeMarkers', poetryData.mode.narrativeMarkers),
    addressMarkers: toSet('mode.addressMarkers', poetryData.mode.addressMarkers),
    contemplationVerbs: toSet('mode.contemplationVerbs', poetryData.mode.contemplationVerbs),
    abstractMarkers: toSet('mode.abstractMarkers', poetryData.mode.abstractMarkers),
};

export const EXPOSITION_MARKERS = toSet('expositionMarkers', poetryData.expositionMarkers);
export const DIRECTION_WORDS = toSet('directionWords', poetryData.directionWords);

// ═══════════════════════════════════════════════════════════
// 6. PLOT
// ═══════════════════════════════════════════════════════════

export interface PlotPointTypeDef {
    key: string;
    name: string;
    emoji: string;
    expectedPosition: number;
    /** Curve positions below this bound (and above the previous type's) classify as this type */
    upperBound: number;
    question: string;
    failure: string;
}

function requirePointTypes(table: string, types: readonly PlotPointTypeDef[]): readonly PlotPointTypeDef[] {
    if (types.length === 0) throw new LexiconError(table, 'no plot point types');
    let previous = 0;
    for (const t of types) {
        if (t.upperBound <= previous) {
            throw new LexiconError(table, `"${t.name}" bound ${t.upperBound} is not ascending`);
        }
        previous = t.upperBound;
    }
    return types;
}

function requireKeys(
    table: string,
    keys: readonly string[],
    types: readonly PlotPointTypeDef[],
): readonly PlotPointTypeDef[] {
    return keys.map(key => {
        const found = types.find(t => t.key === key);
        if (!found) throw new LexiconError(table, `unknown plot point "${key}"`);
        return found;
    });
}

export const PLOT_WORDS = {
    tension: toSet('plot.tensionWords', plotData.tensionWords),
    action: toSet('plot.actionVerbs', plotData.actionVerbs),
    revelation: toSet('plot.revelationWords', plotData.revelationWords),
    internalChange: toSet('plot.internalChangeWords', plotData.internalChangeWords),
    thematic: toSet('plot.thematicWords', plotData.thematicWords),
    visualAction: toSet('plot.visualActionWords', plotData.visualActionWords),
};

export const NOVEL_POINT_TYPES = requirePointTypes('novelPointTypes', plotData.novelPointTypes);
export const SCREENPLAY_POINT_TYPES = requirePointTypes(
    'screenplayPointTypes',
    plotData.screenplayPointTypes,
);
export const NOVEL_KEY_BEATS = requireKeys('novelKeyBeats', plotData.novelKeyBeats, NOVEL_POINT_TYPES);
export const SCREENPLAY_KEY_BEATS = requireKeys(
    'screenplayKeyBeats',
    plotData.screenplayKeyBeats,
    SCREENPLAY_POINT_TYPES,
);
