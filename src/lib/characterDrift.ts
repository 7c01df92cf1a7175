/**
 * characterDrift.ts — How a character's language, inner life and relationships move
 *
 * Language drift compares the first and last sampled chapters; alignment
 * tracks the gap between what a character feels and what they do; relationship
 * evolution scores sentences where two characters share the stage.
 */

import type {
    AlignmentPoint,
    Chapter,
    CertaintyTrend,
    DriftSummary,
    GapTrend,
    InternalExternalAlignmentData,
    LanguageDriftData,
    LanguageMetrics,
    ModalShift,
    PowerDirection,
    PronounShift,
    RelationshipEdge,
    RelationshipEvolutionData,
    RelationshipEvolutionPoint,
    SentenceTrend,
    Trend,
} from '../types/analysis';
import {
    chapterSentences,
    mentions,
    sampleChapters,
    type CharacterContext,
} from './characterAnalytics';
import { ANALYSIS_CONFIG } from './config';
import { ALIGNMENT_WORDS, DOMINANCE_VERBS, DRIFT_WORDS, NEGATIONS, SENTIMENT_LEXICON } from './lexicons';
import { splitSentences } from './segmentation';

const CFG = ANALYSIS_CONFIG.drift;

const round3 = (n: number) => parseFloat(n.toFixed(3));
const clamp = (n: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, n));

// ═══════════════════════════════════════════════════════════
// 1. SENTIMENT
// ═══════════════════════════════════════════════════════════

/** Lowercased words; apostrophes and hyphens kept */
export function tokenise(text: string): string[] {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9\s'-]/g, '')
        .split(/\s+/)
        .filter(w => w.length > 0);
}

const isNegation = (word: string) => NEGATIONS.has(word) || word.endsWith("n't");

export interface SentimentScore {
    /** Normalised to [-1, 1] */
    score: number;
    /** Lexicon words found */
    hits: number;
    tokens: number;
}

/**
 * Lexicon sentiment. A negation flips the next sentiment word when it falls
 * within two tokens.
 */
export function scoreSentiment(text: string): SentimentScore {
    const words = tokenise(text);
    let score = 0;
    let hits = 0;
    let negationWindow = 0;

    for (const word of words) {
        if (isNegation(word)) {
            negationWindow = 2;
            continue;
        }
        const value = SENTIMENT_LEXICON.get(word) ?? 0;
        if (value !== 0) {
            score += negationWindow > 0 ? -value : value;
            hits++;
            negationWindow = 0;
        } else if (negationWindow > 0) {
            negationWindow--;
        }
    }

    const normalised = words.length > 0 ? clamp(score / (words.length * 0.5), -1, 1) : 0;
    return { score: round3(normalised), hits, tokens: words.length };
}

// ═══════════════════════════════════════════════════════════
// 2. LANGUAGE DRIFT
// ═══════════════════════════════════════════════════════════

function countIn(words: readonly string[], lexicon: ReadonlySet<string>): number {
    return words.filter(w => lexicon.has(w)).length;
}

export function measureLanguage(chapter: number, sentences: readonly string[]): LanguageMetrics {
    const words = sentences.flatMap(tokenise);
    const perWord = (n: number) => (words.length > 0 ? round3(n / words.length) : 0);
    const perSentence = (n: number) => (sentences.length > 0 ? round3(n / sentences.length) : 0);

    const certainty = countIn(words, DRIFT_WORDS.certainty);
    const hedges = countIn(words, DRIFT_WORDS.hedges);
    const emotionalHits = sentences.reduce((sum, s) => sum + scoreSentiment(s).hits, 0);

    return {
        chapter,
        pronounI: perWord(countIn(words, DRIFT_WORDS.pronounI)),
        pronounWe: perWord(countIn(words, DRIFT_WORDS.pronounWe)),
        modalMust: perSentence(countIn(words, DRIFT_WORDS.obligation)),
        modalChoice: perSentence(countIn(words, DRIFT_WORDS.choice)),
        emotionalDensity: perSentence(emotionalHits),
        avgSentenceLength: perSentence(words.length),
        certaintyScore: certainty + hedges > 0 ? round3(certainty / (certainty + hedges)) : 0.5,
    };
}

/** Relative change beyond the stable band, as -1, 0 or 1 */
export function relativeDirection(from: number, to: number): -1 | 0 | 1 {
    const scale = Math.max(Math.abs(from), Math.abs(to));
    if (scale === 0 || Math.abs(to - from) / scale <= CFG.stableDelta) return 0;
    return to > from ? 1 : -1;
}

function pronounShift(first: LanguageMetrics, last: LanguageMetrics): PronounShift {
    if (first.pronounI > first.pronounWe && last.pronounWe > last.pronounI && last.pronounWe >= CFG.pronounMinRate) {
        return 'I → We';
    }
    if (first.pronounWe > first.pronounI && last.pronounI > last.pronounWe && last.pronounI >= CFG.pronounMinRate) {
        return 'We → I';
    }
    return 'Stable';
}

function modalShift(first: LanguageMetrics, last: LanguageMetrics): ModalShift {
    if (first.modalMust > first.modalChoice && last.modalChoice > last.modalMust) return 'Obligation → Choice';
    if (first.modalChoice > first.modalMust && last.modalMust > last.modalChoice) return 'Choice → Obligation';
    return 'Stable';
}

function trend(direction: -1 | 0 | 1): Trend {
    if (direction > 0) return 'Increasing';
    return direction < 0 ? 'Decreasing' : 'Stable';
}

function sentenceTrend(direction: -1 | 0 | 1): SentenceTrend {
    if (direction > 0) return 'Longer';
    return direction < 0 ? 'Shorter' : 'Stable';
}

export function summarizeDrift(metrics: readonly LanguageMetrics[]): DriftSummary {
    if (metrics.length < 2) {
        return {
            pronounShift: 'Stable',
            modalShift: 'Stable',
            emotionalTrend: 'Stable',
            sentenceTrend: 'Stable',
            certaintyTrend: 'Stable',
        };
    }

    const first = metrics[0];
    const last = metrics[metrics.length - 1];
    const certaintyDelta = last.certaintyScore - first.certaintyScore;
    let certaintyTrend: CertaintyTrend = 'Stable';
    if (certaintyDelta > CFG.stableDelta) certaintyTrend = 'More Certain';
    else if (certaintyDelta < -CFG.stableDelta) certaintyTrend = 'Less Certain';

    return {
        pronounShift: pronounShift(first, last),
        modalShift: modalShift(first, last),
        emotionalTrend: trend(relativeDirection(first.emotionalDensity, last.emotionalDensity)),
        sentenceTrend: sentenceTrend(relativeDirection(first.avgSentenceLength, last.avgSentenceLength)),
        certaintyTrend,
    };
}

export function analyzeLanguageDrift(
    character: CharacterContext,
    chapters: readonly Chapter[],
): LanguageDriftData {
    const metrics: LanguageMetrics[] = [];
    for (const chapter of sampleChapters(chapters)) {
        const { aliased } = chapterSentences(chapter, character);
        if (aliased.length === 0) continue;
        metrics.push(measureLanguage(chapter.number, aliased));
    }
    return { characterName: character.name, metrics, drift: summarizeDrift(metrics) };
}

// ═══════════════════════════════════════════════════════════
// 3. INTERNAL / EXTERNAL ALIGNMENT
// ═══════════════════════════════════════════════════════════

function innerLabel(level: number, valence: number): string {
    const tone = valence > 0.05 ? 'hopeful' : valence < -0.05 ? 'troubled' : 'unsettled';
    if (level >= 0.6) return `Intense inner life, ${tone}`;
    if (level >= 0.3) return `Active inner life, ${tone}`;
    return 'Guarded interior';
}

function outerLabel(level: number, masking: number): string {
    if (masking > 0) return 'Masking behaviour';
    if (level >= 0.6) return 'Highly active';
    if (level >= 0.3) return 'Engaged';
    return 'Withdrawn';
}

export function measureAlignment(chapter: number, sentences: readonly string[]): AlignmentPoint {
    const words = sentences.flatMap(tokenise);
    const n = Math.max(1, sentences.length);
    const sentiment = scoreSentiment(sentences.join(' '));

    const interiority = countIn(words, ALIGNMENT_WORDS.interiority);
    const outward = countIn(words, ALIGNMENT_WORDS.outward);
    const masking = countIn(words, ALIGNMENT_WORDS.masking);

    const innerTruth = round3(clamp((interiority + sentiment.hits) / n / 2, 0, 1));
    const outerBehavior = round3(clamp((outward + masking) / n / 2, 0, 1));

    return {
        chapter,
        innerTruth,
        outerBehavior,
        innerLabel: innerLabel(innerTruth, sentiment.score),
        outerLabel: outerLabel(outerBehavior, masking),
    };
}

export function classifyGapTrend(points: readonly AlignmentPoint[]): GapTrend {
    if (points.length < 2) return 'Stabilizing (Coping)';

    const gaps = points.map(p => Math.abs(p.innerTruth - p.outerBehavior));
    const steps = gaps.slice(1).map((g, i) => g - gaps[i]).filter(d => Math.abs(d) > CFG.alignmentGapDelta);
    let reversals = 0;
    for (let i = 1; i < steps.length; i++) {
        if (Math.sign(steps[i]) !== Math.sign(steps[i - 1])) reversals++;
    }
    if (reversals >= 2) return 'Fluctuating';

    const first = points[0];
    const last = points[points.length - 1];
    const delta = gaps[gaps.length - 1] - gaps[0];
    if (delta > CFG.alignmentGapDelta) return 'Widening (Denial/Repression)';
    if (delta < -CFG.alignmentGapDelta) {
        return last.innerTruth < first.innerTruth && last.outerBehavior < first.outerBehavior
            ? 'Closing (Collapse)'
            : 'Closing (Integration)';
    }
    return 'Stabilizing (Coping)';
}

export function analyzeAlignment(
    character: CharacterContext,
    chapters: readonly Chapter[],
): InternalExternalAlignmentData {
    const points: AlignmentPoint[] = [];
    for (const chapter of sampleChapters(chapters)) {
        const { aliased } = chapterSentences(chapter, character);
        if (aliased.length === 0) continue;
        points.push(measureAlignment(chapter.number, aliased));
    }
    return { characterName: character.name, points, gapTrend: classifyGapTrend(points) };
}

// ═══════════════════════════════════════════════════════════
// 4. RELATIONSHIP EVOLUTION
// ═══════════════════════════════════════════════════════════

function firstMentionIndex(sentence: string, character: CharacterContext): number {
    let best = -1;
    for (const pattern of character.patterns) {
        const index = sentence.search(pattern);
        if (index >= 0 && (best < 0 || index < best)) best = index;
    }
    return best;
}

/** Who acts on whom: the character named first in a sentence with a dominance verb */
export function powerDirection(
    sentences: readonly string[],
    from: CharacterContext,
    to: CharacterContext,
): PowerDirection {
    let fromLeads = 0;
    let toLeads = 0;
    for (const sentence of sentences) {
        if (!tokenise(sentence).some(w => DOMINANCE_VERBS.has(w))) continue;
        const a = firstMentionIndex(sentence, from);
        const b = firstMentionIndex(sentence, to);
        if (a < 0 || b < 0 || a === b) continue;
        if (a < b) fromLeads++;
        else toLeads++;
    }
    if (fromLeads > toLeads) return 'fromToTo';
    if (toLeads > fromLeads) return 'toToFrom';
    return 'balanced';
}

function meanSentiment(sentences: readonly string[]): number {
    if (sentences.length === 0) return 0;
    return round3(sentences.reduce((sum, s) => sum + scoreSentiment(s).score, 0) / sentences.length);
}

function describeTrust(trust: number, moments: number): string {
    const label = trust > 0.2 ? 'Warm exchange' : trust < -0.2 ? 'Tense exchange' : 'Guarded exchange';
    return `${label} (${moments} shared ${moments === 1 ? 'moment' : 'moments'})`;
}

export function analyzeRelationships(
    characters: readonly CharacterContext[],
    chapters: readonly Chapter[],
): RelationshipEvolutionData {
    const mentionCounts = characters.map(c =>
        chapters.reduce((sum, ch) => sum + splitSentences(ch.text).filter(s => mentions(s, c)).length, 0),
    );
    const totalMentions = mentionCounts.reduce((a, b) => a + b, 0);

    const nodes = characters.map((c, i) => ({
        character: c.name,
        emotionalInvestment: totalMentions > 0 ? round3(mentionCounts[i] / totalMentions) : 0,
    }));

    const sampled = new Set(sampleChapters(chapters).map(c => c.number));
    const ranked: Array<{ edge: RelationshipEdge; moments: number }> = [];

    for (let a = 0; a < characters.length; a++) {
        for (let b = a + 1; b < characters.length; b++) {
            const from = characters[a];
            const to = characters[b];
            const shared: string[] = [];
            const evolution: RelationshipEvolutionPoint[] = [];

            for (const chapter of chapters) {
                const together = splitSentences(chapter.text).filter(s => mentions(s, from) && mentions(s, to));
                if (together.length === 0) continue;
                shared.push(...together);
                if (sampled.has(chapter.number)) {
                    const trustLevel = meanSentiment(together);
                    evolution.push({
                        chapter: chapter.number,
                        trustLevel,
                        description: describeTrust(trustLevel, together.length),
                    });
                }
            }

            if (shared.length === 0) continue;
            ranked.push({
                moments: shared.length,
                edge: {
                    from: from.name,
                    to: to.name,
                    trustLevel: meanSentiment(shared),
                    powerDirection: powerDirection(shared, from, to),
                    evolution,
                },
            });
        }
    }

    ranked.sort((x, y) => y.moments - x.moments);
    return { nodes, edges: ranked.map(r => r.edge) };
}
