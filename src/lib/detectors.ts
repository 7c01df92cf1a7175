/**
 * detectors.ts — Lexicon and pattern detectors for prose craft issues
 *
 * Passive voice, adverbs, weak verbs, clichés, filter words and sensory detail.
 * Each detector returns the full match count plus a short, deduplicated sample.
 */

import { ANALYSIS_CONFIG } from './config';
import {
    ADVERB_EXCEPTIONS,
    CLICHES,
    FILTER_WORDS,
    PASSIVE_PATTERNS,
    SENSORY_PATTERN,
    WEAK_VERBS,
} from './lexicons';
import { cleanToken } from './segmentation';

export interface DetectorResult {
    count: number;
    examples: string[];
}

/** Keep first occurrences, compared case-insensitively, up to `limit`. */
export function dedupeExamples(
    items: Iterable<string>,
    limit: number = ANALYSIS_CONFIG.maxExamples,
): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const item of items) {
        const key = item.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(item);
        if (out.length >= limit) break;
    }
    return out;
}

// ─── Passive Voice ──────────────────────────────────────────────────────────

export function detectPassiveVoice(text: string): DetectorResult {
    let count = 0;
    const samples: string[] = [];

    for (const pattern of PASSIVE_PATTERNS) {
        const matches = text.match(pattern) ?? [];
        count += matches.length;
        samples.push(...matches.slice(0, ANALYSIS_CONFIG.maxExamples).map(m => m.toLowerCase()));
    }

    return { count, examples: dedupeExamples(samples) };
}

// ─── Token Detectors ────────────────────────────────────────────────────────

function detectTokens(tokens: readonly string[], accept: (word: string) => boolean): DetectorResult {
    const hits: string[] = [];
    for (const token of tokens) {
        const word = cleanToken(token);
        if (word.length > 0 && accept(word)) hits.push(word);
    }
    return { count: hits.length, examples: dedupeExamples(hits) };
}

export function detectAdverbs(tokens: readonly string[]): DetectorResult {
    return detectTokens(
        tokens,
        w => w.endsWith('ly') && w.length > 2 && !ADVERB_EXCEPTIONS.has(w),
    );
}

export function detectWeakVerbs(tokens: readonly string[]): DetectorResult {
    return detectTokens(tokens, w => WEAK_VERBS.has(w));
}

export function detectFilterWords(tokens: readonly string[]): DetectorResult {
    return detectTokens(tokens, w => FILTER_WORDS.has(w));
}

// ─── Phrase Detectors ───────────────────────────────────────────────────────

/** Count = number of distinct clichés present anywhere in the text */
export function detectCliches(text: string): DetectorResult {
    const lower = text.toLowerCase();
    const found = CLICHES.filter(phrase => lower.includes(phrase));
    return { count: found.length, examples: dedupeExamples(found) };
}

export function countSensoryDetails(text: string): number {
    return text.match(SENSORY_PATTERN)?.length ?? 0;
}

/** Fewer sensory words than one per fifty words of text */
export function isMissingSensoryDetail(wordCount: number, sensoryCount: number): boolean {
    if (wordCount <= 0) return false;
    const expected = Math.max(1, Math.floor(wordCount / ANALYSIS_CONFIG.sensoryWordsPerDetail));
    return sensoryCount < expected;
}
