/**
 * dialogue.ts — Dialogue extraction and ten-point quality heuristics
 *
 * Prose dialogue comes from quotation marks; screenplay dialogue from the
 * lines under a character cue. The quality score awards one point per check.
 */

import { ANALYSIS_CONFIG } from './config';
import {
    CONFLICT_WORDS,
    DIALOGUE_FILLERS,
    DIALOGUE_TAGS,
    PREDICTABLE_PHRASES,
    SCREENPLAY_TRANSITIONS,
} from './lexicons';
import { populationStdDev } from './readability';

const QUOTE_CHARS = new Set(['"', '“', '”']);
const CFG = ANALYSIS_CONFIG.dialogue;

// ═══════════════════════════════════════════════════════════
// 1. PROSE EXTRACTION
// ═══════════════════════════════════════════════════════════

/** Text between alternating quote marks; straight and curly quotes all toggle. */
export function extractQuotedDialogue(text: string): string[] {
    if (![...QUOTE_CHARS].some(q => text.includes(q))) return [];

    const segments: string[] = [];
    let current = '';
    let inside = false;

    for (const ch of text) {
        if (QUOTE_CHARS.has(ch)) {
            if (inside) {
                const trimmed = current.trim();
                if (trimmed.length > 0) segments.push(trimmed);
                current = '';
            }
            inside = !inside;
        } else if (inside) {
            current += ch;
        }
    }

    return segments;
}

// ═══════════════════════════════════════════════════════════
// 2. SCREENPLAY EXTRACTION
// ═══════════════════════════════════════════════════════════

export function isSceneHeading(line: string): boolean {
    const trimmed = line.trim();
    if (trimmed.length === 0) return false;
    return /^(INT\.|EXT\.|INT\/EXT|EXT\/INT|INT\s|EXT\s)/.test(trimmed.toUpperCase());
}

export function isTransition(line: string): boolean {
    const trimmed = line.trim();
    if (trimmed.length === 0) return false;
    const upper = trimmed.toUpperCase();
    if (upper.endsWith(':')) return true;
    return SCREENPLAY_TRANSITIONS.some(prefix => upper.startsWith(prefix));
}

export function isCharacterCue(line: string): boolean {
    const trimmed = line.trim();
    if (trimmed.length === 0) return false;
    const upper = trimmed.toUpperCase();
    if (upper !== trimmed) return false;
    if (isSceneHeading(upper) || isTransition(upper)) return false;
    if (upper.length > CFG.screenplayCueMaxLength) return false;
    if (upper.includes(':')) return false;
    if (!/[A-Z]/.test(upper)) return false;
    return /^[A-Z0-9 .()'"-]+$/.test(upper);
}

/**
 * Speech blocks under character cues. A block ends at a blank line (consumed),
 * another cue, a scene heading or a transition; its lines join with spaces.
 */
export function extractScreenplayDialogue(text: string): string[] {
    const lines = text.split(/\r\n|\r|\n/);
    while (lines.length > 0 && lines[lines.length - 1].trim().length === 0) lines.pop();

    const segments: string[] = [];
    let index = 0;

    while (index < lines.length) {
        if (!isCharacterCue(lines[index])) {
            index++;
            continue;
        }

        index++;
        const buffer: string[] = [];
        while (index < lines.length) {
            const trimmed = lines[index].trim();
            if (trimmed.length === 0) {
                index++;
                break;
            }
            if (isCharacterCue(trimmed) || isSceneHeading(trimmed) || isTransition(trimmed)) break;
            buffer.push(trimmed);
            index++;
        }

        const combined = buffer.join(' ').trim();
        if (combined.length > 0) segments.push(combined);
    }

    return segments;
}

/** Screenplay extraction first when asked for; quotes when it finds nothing. */
export function extractDialogue(text: string, screenplay: boolean): string[] {
    if (screenplay) {
        const segments = extractScreenplayDialogue(text);
        if (segments.length > 0) return segments;
    }
    return extractQuotedDialogue(text);
}

// ═══════════════════════════════════════════════════════════
// 3. QUALITY CHECKS
// ═══════════════════════════════════════════════════════════

export interface DialogueQuality {
    qualityScore: number;
    segmentCount: number;
    fillerCount: number;
    repetitionScore: number;
    tagVariety: number;
    predictablePhrases: string[];
    expositionCount: number;
    pacingScore: number;
    hasConflict: boolean;
}

export const EMPTY_DIALOGUE_QUALITY: DialogueQuality = {
    qualityScore: 0,
    segmentCount: 0,
    fillerCount: 0,
    repetitionScore: 0,
    tagVariety: 0,
    predictablePhrases: [],
    expositionCount: 0,
    pacingScore: 0,
    hasConflict: false,
};

const EDGE_PUNCTUATION = /^\p{P}+|\p{P}+$/gu;

export function detectRepetition(segments: readonly string[]): { repeated: boolean; score: number } {
    if (segments.length <= CFG.repetitionMinSegments) return { repeated: false, score: 0 };

    const counts = new Map<string, number>();
    for (const segment of segments) {
        const key = segment.toLowerCase().replace(EDGE_PUNCTUATION, '');
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    const repetitions = [...counts.values()].filter(c => c > CFG.repetitionThreshold).length;
    return {
        repeated: repetitions > 0,
        score: Math.min(100, Math.floor((repetitions * 100) / segments.length)),
    };
}

function countSegmentsContaining(segments: readonly string[], needles: readonly string[]): number {
    return segments.filter(s => {
        const lower = s.toLowerCase();
        return needles.some(n => lower.includes(n));
    }).length;
}

export function countFillerSegments(segments: readonly string[]): number {
    return countSegmentsContaining(segments, DIALOGUE_FILLERS);
}

/** Distinct attribution verbs appearing anywhere in the text */
export function tagVariety(text: string): number {
    const lower = text.toLowerCase();
    return DIALOGUE_TAGS.filter(tag => lower.includes(tag)).length;
}

export function findPredictablePhrases(segments: readonly string[]): string[] {
    const found: string[] = [];
    for (const segment of segments) {
        const lower = segment.toLowerCase();
        for (const phrase of PREDICTABLE_PHRASES) {
            if (lower.includes(phrase) && !found.includes(phrase)) {
                found.push(phrase);
                if (found.length >= CFG.predictableCollectLimit) return found;
            }
        }
    }
    return found;
}

/** Long lines of speech with no question or exclamation */
export function countExposition(segments: readonly string[]): number {
    return segments.filter(
        s => s.length > CFG.expositionLength && !s.includes('?') && !s.includes('!'),
    ).length;
}

export function hasConflict(segments: readonly string[]): boolean {
    const hits = countSegmentsContaining(segments, CONFLICT_WORDS);
    return hits / Math.max(1, segments.length) > CFG.minConflictRatio;
}

export function hasEmotionalRange(segments: readonly string[]): boolean {
    const kinds = [
        segments.some(s => s.includes('!')),
        segments.some(s => s.includes('?')),
        segments.some(s => s.includes('...') || s.includes('…')),
    ];
    return kinds.filter(Boolean).length >= CFG.minPunctuationKinds;
}

export function dialoguePacing(segments: readonly string[]): number {
    if (segments.length <= 1) return 0;
    const sd = populationStdDev(segments.map(s => s.length));
    return Math.min(100, Math.floor((sd / CFG.pacingStdDevScale) * 100));
}

/**
 * Score dialogue out of 100 from ten checks: depth, repetition, fillers, tag
 * variety, predictability, progression, exposition, conflict, emotional range and pacing.
 */
export function scoreDialogueQuality(segments: readonly string[], fullText: string): DialogueQuality {
    const n = segments.length;
    if (n === 0) return { ...EMPTY_DIALOGUE_QUALITY };

    let points = 0;

    const averageLength = Math.floor(segments.reduce((sum, s) => sum + s.length, 0) / n);
    if (averageLength > CFG.minAverageLength) points++;

    const repetition = detectRepetition(segments);
    if (!repetition.repeated) points++;

    const fillerCount = countFillerSegments(segments);
    if (fillerCount / n < CFG.maxFillerRatio) points++;

    const tags = tagVariety(fullText);
    if (tags > CFG.minTagVariety) points++;

    const predictablePhrases = findPredictablePhrases(segments);
    if (predictablePhrases.length < CFG.maxPredictable) points++;

    if (n > CFG.progressionMinSegments) {
        const half = Math.floor(n / 2);
        const firstHalf = new Set(segments.slice(0, half));
        const secondHalf = new Set(segments.slice(n - half));
        if (secondHalf.size > firstHalf.size) points++;
    }

    const expositionCount = countExposition(segments);
    if (expositionCount < Math.floor(n / CFG.expositionDivisor)) points++;

    const conflict = hasConflict(segments);
    if (conflict) points++;

    if (hasEmotionalRange(segments)) points++;

    const pacingScore = dialoguePacing(segments);
    if (pacingScore > CFG.minPacingScore) points++;

    return {
        qualityScore: Math.floor((points * 100) / CFG.checks),
        segmentCount: n,
        fillerCount,
        repetitionScore: repetition.score,
        tagVariety: tags,
        predictablePhrases,
        expositionCount,
        pacingScore,
        hasConflict: conflict,
    };
}
