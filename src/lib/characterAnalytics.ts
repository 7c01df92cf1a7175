/**
 * characterAnalytics.ts — Per-character narrative structures
 *
 * Presence, pairwise interactions, belief-shift matrices, decision-consequence
 * chains and decision–belief loops. All extraction is sentence-level keyword
 * matching against the character's aliases; there is no parsing.
 */

import type {
    ArcQuality,
    BeliefEntry,
    BeliefShiftMatrix,
    ChainEntry,
    Chapter,
    CharacterInteraction,
    CharacterPresence,
    CharacterRegistry,
    DecisionBeliefLoop,
    DecisionConsequenceChain,
    LoopEntry,
    PageMappingEntry,
} from '../types/analysis';
import { aliasesForName } from './characterRegistry';
import { ANALYSIS_CONFIG } from './config';
import {
    BELIEF_INDICATORS,
    COUNTERPRESSURE_INDICATORS,
    DECISION_INDICATORS,
    EFFECT_INDICATORS,
    escapeRegExp,
    EVIDENCE_INDICATORS,
    OUTCOME_INDICATORS,
} from './lexicons';
import { splitSentences, tokenizeWords } from './segmentation';

const CFG = ANALYSIS_CONFIG.characters;

export const PLACEHOLDERS = {
    evidence: "Character's actions reflect this belief",
    counterpressure: 'Circumstances test this perspective',
    impliedBelief: 'Belief implied by character actions',
    outcome: 'Direct consequences unfold',
    effect: 'Character trajectory shifts',
    noDecision: 'No explicit decision keyword found',
} as const;

// ═══════════════════════════════════════════════════════════
// 1. CHARACTER CONTEXT
// ═══════════════════════════════════════════════════════════

export interface CharacterContext {
    name: string;
    aliases: string[];
    patterns: RegExp[];
}

export function buildCharacterContext(name: string, registry?: CharacterRegistry): CharacterContext {
    const aliases = aliasesForName(name, registry);
    return {
        name,
        aliases,
        patterns: aliases.map(a => new RegExp(`\\b${escapeRegExp(a)}\\b`, 'i')),
    };
}

export function mentions(text: string, character: CharacterContext): boolean {
    return character.patterns.some(p => p.test(text));
}

/** Up to 18 chapter indices spread evenly from first to last */
export function sampleChapterIndices(count: number): number[] {
    const k = Math.min(count, CFG.maxSampledChapters);
    if (count <= k) return Array.from({ length: count }, (_, i) => i);

    const indices: number[] = [];
    for (let i = 0; i < k; i++) {
        const idx = Math.min(count - 1, Math.round((i * (count - 1)) / (k - 1)));
        if (!indices.includes(idx)) indices.push(idx);
    }
    return indices;
}

export function sampleChapters(chapters: readonly Chapter[]): Chapter[] {
    return sampleChapterIndices(chapters.length).map(i => chapters[i]);
}

/** Page of the last mapping location at or before the chapter start */
export function chapterPageFor(
    chapter: Chapter,
    mapping?: readonly PageMappingEntry[],
): number | undefined {
    if (!mapping || mapping.length === 0) return undefined;
    const sorted = [...mapping].sort((a, b) => a.location - b.location);
    let page = sorted[0].page;
    for (const entry of sorted) {
        if (entry.location > chapter.startOffset) break;
        page = entry.page;
    }
    return page;
}

function withPage<T extends object>(entry: T, chapter: Chapter, mapping?: readonly PageMappingEntry[]) {
    const chapterPage = chapterPageFor(chapter, mapping);
    return chapterPage === undefined ? entry : { ...entry, chapterPage };
}

// ═══════════════════════════════════════════════════════════
// 2. SENTENCE EXTRACTION
// ═══════════════════════════════════════════════════════════

const excerpt = (sentence: string) => sentence.trim().slice(0, CFG.sentenceExcerptLength);

function hasIndicator(sentence: string, indicators: readonly string[]): boolean {
    const lower = sentence.toLowerCase();
    return indicators.some(i => lower.includes(i));
}

/** Chapter sentences paired with whether they mention the character */
export interface ChapterSentences {
    all: string[];
    aliased: string[];
}

export function chapterSentences(chapter: Chapter, character: CharacterContext): ChapterSentences {
    const all = splitSentences(chapter.text);
    return { all, aliased: all.filter(s => mentions(s, character)) };
}

/** Alias + indicator sentence, else any alias sentence */
export function extractBelief(sentences: ChapterSentences): string | undefined {
    const found =
        sentences.aliased.find(s => hasIndicator(s, BELIEF_INDICATORS)) ?? sentences.aliased[0];
    return found === undefined ? undefined : excerpt(found);
}

/** Alias + indicator sentence, else any indicator sentence, else any alias sentence */
export function extractWithFallback(
    sentences: ChapterSentences,
    indicators: readonly string[],
): string | undefined {
    const found =
        sentences.aliased.find(s => hasIndicator(s, indicators)) ??
        sentences.all.find(s => hasIndicator(s, indicators)) ??
        sentences.aliased[0];
    return found === undefined ? undefined : excerpt(found);
}

export function extractDecision(sentences: ChapterSentences): string | undefined {
    const found = sentences.aliased.find(s => hasIndicator(s, DECISION_INDICATORS));
    return found === undefined ? undefined : excerpt(found);
}

// ═══════════════════════════════════════════════════════════
// 3. BELIEFS, DECISIONS & LOOPS
// ═══════════════════════════════════════════════════════════

export function buildBeliefShiftMatrix(
    character: CharacterContext,
    chapters: readonly Chapter[],
    mapping?: readonly PageMappingEntry[],
): BeliefShiftMatrix {
    const entries: BeliefEntry[] = [];

    for (const chapter of sampleChapters(chapters)) {
        if (entries.length >= CFG.maxBeliefEntries) break;
        if (!mentions(chapter.text, character)) continue;

        const sentences = chapterSentences(chapter, character);
        const coreBelief = extractBelief(sentences);
        if (coreBelief === undefined) continue;

        entries.push(
            withPage(
                {
                    chapter: chapter.number,
                    coreBelief,
                    evidence: extractWithFallback(sentences, EVIDENCE_INDICATORS) ?? PLACEHOLDERS.evidence,
                    counterpressure:
                        extractWithFallback(sentences, COUNTERPRESSURE_INDICATORS) ??
                        PLACEHOLDERS.counterpressure,
                },
                chapter,
                mapping,
            ),
        );
    }

    if (entries.length === 0) {
        const first = chapters.find(c => mentions(c.text, character));
        if (first) {
            const sentences = chapterSentences(first, character);
            entries.push(
                withPage(
                    {
                        chapter: first.number,
                        coreBelief: extractBelief(sentences) ?? PLACEHOLDERS.impliedBelief,
                        evidence: extractWithFallback(sentences, EVIDENCE_INDICATORS) ?? PLACEHOLDERS.evidence,
                        counterpressure:
                            extractWithFallback(sentences, COUNTERPRESSURE_INDICATORS) ??
                            PLACEHOLDERS.counterpressure,
                    },
                    first,
                    mapping,
                ),
            );
        }
    }

    return { characterName: character.name, entries };
}

export function buildDecisionConsequenceChain(
    character: CharacterContext,
    chapters: readonly Chapter[],
    mapping?: readonly PageMappingEntry[],
): DecisionConsequenceChain {
    const entries: ChainEntry[] = [];

    for (const chapter of sampleChapters(chapters)) {
        if (entries.length >= CFG.maxDecisionEntries) break;
        if (!mentions(chapter.text, character)) continue;

        const sentences = chapterSentences(chapter, character);
        const decision = extractDecision(sentences);
        if (decision === undefined) continue;

        entries.push(
            withPage(
                {
                    chapter: chapter.number,
                    decision,
                    immediateOutcome: extractWithFallback(sentences, OUTCOME_INDICATORS) ?? PLACEHOLDERS.outcome,
                    longTermEffect: extractWithFallback(sentences, EFFECT_INDICATORS) ?? PLACEHOLDERS.effect,
                },
                chapter,
                mapping,
            ),
        );
    }

    if (entries.length === 0) {
        const base: ChainEntry = {
            chapter: chapters[0]?.number ?? 1,
            decision: PLACEHOLDERS.noDecision,
            immediateOutcome: PLACEHOLDERS.outcome,
            longTermEffect: PLACEHOLDERS.effect,
        };
        entries.push(chapters[0] ? withPage(base, chapters[0], mapping) : base);
    }

    return { characterName: character.name, entries };
}

export function classifyArc(entries: readonly LoopEntry[]): ArcQuality {
    if (entries.length < 2) return 'Insufficient Data';
    const beliefs = new Set(entries.map(e => e.beliefInPlay)).size;
    const shifts = new Set(entries.map(e => e.beliefShift)).size;
    if (beliefs === 1 && shifts <= 1) return 'Flat Arc - Beliefs unchanging';
    if (beliefs >= 2 && shifts >= 2) return 'Evolving Arc - Clear pattern change';
    return 'Developing Arc - Some changes';
}

/** Pressure → belief → decision → outcome → shift, per sampled chapter */
export function buildDecisionBeliefLoop(
    character: CharacterContext,
    chapters: readonly Chapter[],
    mapping?: readonly PageMappingEntry[],
): DecisionBeliefLoop {
    const entries: LoopEntry[] = [];

    for (const chapter of sampleChapters(chapters)) {
        if (entries.length >= CFG.maxLoopEntries) break;
        if (!mentions(chapter.text, character)) continue;

        const sentences = chapterSentences(chapter, character);
        const belief = extractBelief(sentences);
        const decision = extractDecision(sentences);
        if (belief === undefined && decision === undefined) continue;

        entries.push(
            withPage(
                {
                    chapter: chapter.number,
                    pressure:
                        extractWithFallback(sentences, COUNTERPRESSURE_INDICATORS) ??
                        PLACEHOLDERS.counterpressure,
                    beliefInPlay: belief ?? PLACEHOLDERS.impliedBelief,
                    decision: decision ?? PLACEHOLDERS.noDecision,
                    outcome: extractWithFallback(sentences, OUTCOME_INDICATORS) ?? PLACEHOLDERS.outcome,
                    beliefShift: extractWithFallback(sentences, EFFECT_INDICATORS) ?? PLACEHOLDERS.effect,
                },
                chapter,
                mapping,
            ),
        );
    }

    return { characterName: character.name, entries, arcQuality: classifyArc(entries) };
}

// ═══════════════════════════════════════════════════════════
// 4. PRESENCE & INTERACTIONS
// ═══════════════════════════════════════════════════════════

function countOccurrences(haystack: string, needle: string): number {
    if (needle.length === 0) return 0;
    return haystack.split(needle).length - 1;
}

export function computeCharacterPresence(
    names: readonly string[],
    chapters: readonly Chapter[],
): CharacterPresence[] {
    const lowered = chapters.map(c => ({ number: c.number, text: c.text.toLowerCase() }));
    return names.map(name => {
        const needle = name.toLowerCase();
        const chapterPresence: Record<number, number> = {};
        for (const chapter of lowered) {
            const count = countOccurrences(chapter.text, needle);
            if (count > 0) chapterPresence[chapter.number] = count;
        }
        return { characterName: name, chapterPresence };
    });
}

/** Split into consecutive sections of `size` whitespace tokens */
export function splitSections(text: string, size: number = CFG.interactionSectionWords): string[] {
    const words = tokenizeWords(text);
    const sections: string[] = [];
    for (let i = 0; i < words.length; i += size) {
        sections.push(words.slice(i, i + size).join(' ').toLowerCase());
    }
    return sections;
}

export function computeCharacterInteractions(
    names: readonly string[],
    text: string,
): CharacterInteraction[] {
    const sections = splitSections(text);
    if (sections.length === 0 || names.length < 2) return [];

    const interactions: CharacterInteraction[] = [];
    for (let a = 0; a < names.length; a++) {
        for (let b = a + 1; b < names.length; b++) {
            const first = names[a].toLowerCase();
            const second = names[b].toLowerCase();
            const shared: number[] = [];
            sections.forEach((section, index) => {
                if (section.includes(first) && section.includes(second)) shared.push(index);
            });
            if (shared.length === 0) continue;
            interactions.push({
                character1: names[a],
                character2: names[b],
                coAppearances: shared.length,
                sections: shared,
                relationshipStrength: shared.length / sections.length,
            });
        }
    }

    return interactions.sort((x, y) => y.coAppearances - x.coAppearances);
}

// ═══════════════════════════════════════════════════════════
// 5. SIGNIFICANT CHARACTERS
// ═══════════════════════════════════════════════════════════

/**
 * Characters worth charting: those over the mention threshold, padded with the
 * next best up to the minimum and capped at the maximum.
 */
export function rankSignificantCharacters(
    presence: readonly CharacterPresence[],
    interactions: readonly CharacterInteraction[],
): string[] {
    const totals = new Map<string, number>();
    let threshold: number;

    if (presence.some(p => Object.keys(p.chapterPresence).length > 0)) {
        threshold = CFG.significantPresenceThreshold;
        for (const p of presence) {
            totals.set(
                p.characterName,
                Object.values(p.chapterPresence).reduce((a, b) => a + b, 0),
            );
        }
    } else {
        threshold = CFG.significantInteractionThreshold;
        for (const i of interactions) {
            totals.set(i.character1, (totals.get(i.character1) ?? 0) + i.coAppearances);
            totals.set(i.character2, (totals.get(i.character2) ?? 0) + i.coAppearances);
        }
    }

    const ranked = [...totals.entries()]
        .filter(([, count]) => count > 0)
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));

    const significant = ranked.filter(([, count]) => count >= threshold);
    const keep = Math.min(CFG.maxSignificant, Math.max(CFG.minSignificant, significant.length));
    return ranked.slice(0, keep).map(([name]) => name);
}
