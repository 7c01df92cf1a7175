/**
 * readability.ts — Reading level, sentence variety and page estimates
 */

import type { DocumentFormat } from '../types/analysis';
import { ANALYSIS_CONFIG } from './config';
import { countWords, splitSentences, tokenizeWords } from './segmentation';

// ═══════════════════════════════════════════════════════════
// 1. FLESCH-KINCAID
// ═══════════════════════════════════════════════════════════

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u', 'y']);

/** Vowel-group count with a silent final `e`, never below 1 */
export function countSyllables(word: string): number {
    const lower = word.toLowerCase();
    let count = 0;
    let previousVowel = false;
    for (const ch of lower) {
        const vowel = VOWELS.has(ch);
        if (vowel && !previousVowel) count++;
        previousVowel = vowel;
    }
    if (lower.endsWith('e') && count > 1) count--;
    return Math.max(1, count);
}

export function fleschKincaidGrade(words: number, sentences: number, syllables: number): number {
    return 0.39 * (words / sentences) + 11.8 * (syllables / words) - 15.59;
}

/**
 * `"Grade n"` with n in [0, 18], or `"--"` when there is nothing to measure.
 * `wordCount` overrides the token count of `text`, so a truncated sample can be
 * graded against the document's full word total.
 */
export function readingLevel(text: string, wordCount?: number): string {
    const tokens = tokenizeWords(text);
    const words = wordCount ?? tokens.length;
    const sentences = splitSentences(text).length;
    if (words === 0 || tokens.length === 0 || sentences === 0) return '--';

    const syllables = tokens.reduce((sum, w) => sum + countSyllables(w), 0);
    const grade = fleschKincaidGrade(words, sentences, syllables);
    const clamped = Math.max(0, Math.min(ANALYSIS_CONFIG.maxReadingGrade, grade));
    return `Grade ${Math.trunc(clamped)}`;
}

// ═══════════════════════════════════════════════════════════
// 2. SENTENCE VARIETY
// ═══════════════════════════════════════════════════════════

export function populationStdDev(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
    return Math.sqrt(variance);
}

export interface SentenceVariety {
    score: number;
    sentenceLengths: number[];
}

export function sentenceVariety(text: string): SentenceVariety {
    const sentences = splitSentences(text);
    if (sentences.length <= 1) return { score: 0, sentenceLengths: [] };

    const sentenceLengths = sentences.map(countWords);
    const sd = populationStdDev(sentenceLengths);
    return {
        score: Math.min(100, Math.floor((sd / ANALYSIS_CONFIG.varietyStdDevScale) * 100)),
        sentenceLengths,
    };
}

// ═══════════════════════════════════════════════════════════
// 3. PAGES & PROPORTIONS
// ═══════════════════════════════════════════════════════════

export interface PageCountInput {
    text: string;
    wordCount: number;
    format: DocumentFormat;
    override?: number;
}

export function estimatePageCount({ text, wordCount, format, override }: PageCountInput): number {
    if (override !== undefined && override > 0) return Math.floor(override);
    if (wordCount === 0) return 0;

    if (format === 'screenplay') {
        const lines = text.split('\n');
        while (lines.length > 0 && lines[lines.length - 1].trim().length === 0) lines.pop();
        return Math.max(1, Math.ceil(lines.length / ANALYSIS_CONFIG.screenplayLinesPerPage));
    }

    return Math.max(1, Math.ceil(wordCount / ANALYSIS_CONFIG.wordsPerPage));
}

export function dialoguePercentage(dialogueWords: number, totalWords: number): number {
    if (totalWords <= 0) return 0;
    return Math.floor((dialogueWords / totalWords) * 100);
}
