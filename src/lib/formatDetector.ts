/**
 * formatDetector.ts — Novel vs. screenplay classification
 *
 * Weighted pattern counts plus layout heuristics (paragraph length, line
 * length, words per page). Ambiguous or short texts default to novel.
 */

import type { FormatDetection, FormatDetector } from '../types/analysis';
import { ANALYSIS_CONFIG } from './config';
import { tokenizeWords } from './segmentation';

interface WeightedPattern {
    pattern: RegExp;
    weight: number;
}

const SCREENPLAY_PATTERNS: readonly WeightedPattern[] = [
    // Sluglines
    { pattern: /^(INT\.|EXT\.|INT\/EXT\.|I\/E\.)/gm, weight: 3 },
    { pattern: /^(INTERIOR|EXTERIOR)/gm, weight: 2.5 },
    { pattern: /^[A-Z][A-Z\s]+\s*-\s*(DAY|NIGHT|CONTINUOUS|LATER|MORNING|EVENING|DAWN|DUSK)/gm, weight: 3 },
    // Centered cues and extensions
    { pattern: /^\s{20,}[A-Z][A-Z\s]+\s*$/gm, weight: 2 },
    { pattern: /^[A-Z]{2,}\s*\(V\.O\.\)|\(O\.S\.\)|\(CONT'D\)/gm, weight: 3 },
    // Parentheticals
    { pattern: /^\s*\([a-z][^)]+\)\s*$/gm, weight: 2 },
    { pattern: /^(FADE IN:|FADE OUT\.|FADE TO:|CUT TO:|DISSOLVE TO:|SMASH CUT:|MATCH CUT:)/gm, weight: 3 },
    // Short action lines
    { pattern: /^[A-Z][^.!?]{10,80}[.!?]\s*$/gm, weight: 0.5 },
    { pattern: /\n{2,}/g, weight: 0.3 },
];

const NOVEL_PATTERNS: readonly WeightedPattern[] = [
    { pattern: /chapter\s+\d+|chapter\s+[a-z]+/gi, weight: 2.5 },
    { pattern: /^part\s+(one|two|three|four|five|\d+)/gi, weight: 2 },
    { pattern: /^[A-Z][^\n]{200,}/gm, weight: 2 },
    { pattern: /\b(thought|wondered|realized|felt|believed|remembered|imagined)\b/gi, weight: 1.5 },
    { pattern: /\b(she thought|he thought|I thought)\b/gi, weight: 2 },
    { pattern: /\b(said|asked|replied|whispered|shouted|murmured)\b\s*,/gi, weight: 1.5 },
    { pattern: /\b(the\s+\w+\s+was|it\s+was\s+a)\b/gi, weight: 0.5 },
    { pattern: /\b(his|her)\s+(eyes|face|voice|heart|hands)\s+(were|was|seemed)/gi, weight: 1.5 },
    { pattern: /\b(the next morning|hours later|days passed|years ago|that night)\b/gi, weight: 1.5 },
];

function weightedScore(text: string, patterns: readonly WeightedPattern[]): number {
    return patterns.reduce((sum, { pattern, weight }) => {
        const matches = text.match(pattern)?.length ?? 0;
        return sum + matches * weight;
    }, 0);
}

export interface FormatScores {
    screenplay: number;
    novel: number;
}

/** Raw evidence for each format; exposed for tests and diagnostics. */
export function scoreFormat(text: string): FormatScores {
    let screenplay = weightedScore(text, SCREENPLAY_PATTERNS);
    let novel = weightedScore(text, NOVEL_PATTERNS);

    const paragraphs = text.split('\n\n').filter(p => p.trim().length > 0);
    if (paragraphs.length > 0) {
        const avg = Math.floor(paragraphs.reduce((s, p) => s + p.length, 0) / paragraphs.length);
        if (avg < 150) screenplay += 3;
        else if (avg > 300) novel += 3;
    }

    const lines = text.split('\n').filter(l => l.length > 0);
    if (lines.length > 0) {
        const avg = Math.floor(lines.reduce((s, l) => s + l.length, 0) / lines.length);
        if (avg < 60) screenplay += 2;
        else if (avg > 80) novel += 2;
    }

    const pages =
        paragraphs.length > 0
            ? Math.max(1, Math.floor(text.length / ANALYSIS_CONFIG.format.charsPerPage))
            : 1;
    const wordsPerPage = Math.floor(tokenizeWords(text).length / pages);
    if (wordsPerPage < 220) screenplay += 2;
    else if (wordsPerPage > 240) novel += 2;

    return { screenplay, novel };
}

export function detectFormat(text: string): FormatDetection {
    const { minLength, screenplayProbability, novelProbability } = ANALYSIS_CONFIG.format;
    const fallback: FormatDetection = { format: 'novel', confidence: 0.5 };
    if (text.length <= minLength) return fallback;

    const scores = scoreFormat(text);
    const total = scores.screenplay + scores.novel;
    if (total <= 0) return fallback;

    const p = scores.screenplay / total;
    if (p > screenplayProbability) return { format: 'screenplay', confidence: Math.min(1, p) };
    if (p < novelProbability) return { format: 'novel', confidence: Math.min(1, 1 - p) };
    return fallback;
}

export const defaultFormatDetector: FormatDetector = { detectFormat };
