/**
 * segmentation.ts — Words, sentences, paragraphs, chapters and poem stanzas
 *
 * All pure functions. Every downstream detector agrees on these boundaries.
 */

import type { Chapter, OutlineEntry } from '../types/analysis';
import { ANALYSIS_CONFIG } from './config';

// ═══════════════════════════════════════════════════════════
// 1. WORDS & SENTENCES
// ═══════════════════════════════════════════════════════════

/** Whitespace tokens, punctuation kept */
export function tokenizeWords(text: string): string[] {
    return text.split(/\s+/).filter(w => w.length > 0);
}

export function countWords(text: string): number {
    return tokenizeWords(text).length;
}

const EDGE_PUNCTUATION = /^\p{P}+|\p{P}+$/gu;

/** Strip leading/trailing punctuation and lowercase */
export function cleanToken(token: string): string {
    return token.replace(EDGE_PUNCTUATION, '').toLowerCase();
}

/** Fragments between `.`, `!` and `?`, untrimmed, blank fragments dropped */
export function splitSentences(text: string): string[] {
    return text.split(/[.!?]/).filter(s => s.trim().length > 0);
}

export function countSentences(text: string): number {
    return splitSentences(text).length;
}

// ═══════════════════════════════════════════════════════════
// 2. PARAGRAPHS
// ═══════════════════════════════════════════════════════════

export interface ParagraphStats {
    paragraphCount: number;
    averageParagraphLength: number;
    /** 1-based indices of paragraphs over the long-paragraph threshold */
    longParagraphs: number[];
}

/** Paragraphs are non-blank lines */
export function splitParagraphs(text: string): string[] {
    return text.split('\n').filter(line => line.trim().length > 0);
}

export function paragraphStats(text: string): ParagraphStats {
    const paragraphs = splitParagraphs(text);
    const longParagraphs: number[] = [];
    let totalWords = 0;

    paragraphs.forEach((p, i) => {
        const words = countWords(p);
        totalWords += words;
        if (words > ANALYSIS_CONFIG.longParagraphWords) longParagraphs.push(i + 1);
    });

    return {
        paragraphCount: paragraphs.length,
        averageParagraphLength:
            paragraphs.length > 0 ? Math.floor(totalWords / paragraphs.length) : 0,
        longParagraphs,
    };
}

// ═══════════════════════════════════════════════════════════
// 3. CHAPTERS
// ═══════════════════════════════════════════════════════════

const CHAPTER_MARKERS: readonly RegExp[] = [
    /Chapter \d+/,
    /CHAPTER \d+/,
    /Ch\. \d+/,
    /\d+\./,
    /# Chapter/,
];

function isChapterMarker(line: string): boolean {
    const trimmed = line.trim();
    return CHAPTER_MARKERS.some(p => p.test(trimmed));
}

/** Split on chapter heading lines; a marker opens a new chapter once the current one has content. */
export function splitChaptersByHeading(text: string): Chapter[] {
    const chapters: Chapter[] = [];
    let current = '';
    let currentStart = 0;
    let currentTitle: string | undefined;
    let offset = 0;

    for (const line of text.split('\n')) {
        if (isChapterMarker(line) && current.length > 0) {
            chapters.push({
                number: chapters.length + 1,
                title: currentTitle,
                text: current,
                startOffset: currentStart,
            });
            current = '';
            currentTitle = undefined;
        }
        if (current.length === 0) {
            currentStart = offset;
            if (isChapterMarker(line)) currentTitle = line.trim();
        }
        current += line + '\n';
        offset += line.length + 1;
    }

    if (current.length > 0) {
        chapters.push({
            number: chapters.length + 1,
            title: currentTitle,
            text: current,
            startOffset: currentStart,
        });
    }

    return chapters.length > 0 ? chapters : [{ number: 1, text, startOffset: 0 }];
}

function pickOutlineLevel(outline: readonly OutlineEntry[]): OutlineEntry[] {
    const levelOne = outline.filter(e => e.level === 1);
    if (levelOne.length > 0) return levelOne;
    const levelZero = outline.filter(e => e.level === 0);
    if (levelZero.length > 0) return levelZero;
    return outline
        .filter(e => e.level === 2)
        .slice(0, ANALYSIS_CONFIG.characters.outlineLevelTwoLimit);
}

/**
 * Chapters from an outline when one is supplied and usable, otherwise by heading
 * detection. Each outline chapter runs from its entry to the next entry's start.
 */
export function splitIntoChapters(text: string, outline?: readonly OutlineEntry[]): Chapter[] {
    const entries = outline ? pickOutlineLevel(outline) : [];
    if (entries.length === 0) return splitChaptersByHeading(text);

    const sorted = [...entries].sort((a, b) => a.rangeStart - b.rangeStart);
    const length = text.length;
    const clamp = (n: number) => Math.max(0, Math.min(length, n));

    return sorted.map((entry, i) => {
        const start = clamp(entry.rangeStart);
        const next = sorted[i + 1];
        const end = clamp(next ? next.rangeStart : length);
        return {
            number: i + 1,
            title: entry.title,
            text: text.slice(start, Math.max(start, end)),
            startOffset: start,
        };
    });
}

// ═══════════════════════════════════════════════════════════
// 4. POEMS
// ═══════════════════════════════════════════════════════════

const isBlank = (line: string) => line.trim().length === 0;

function isTitleCandidate(line: string): boolean {
    const trimmed = line.trim();
    if (trimmed.length === 0) return false;
    if (trimmed.length > ANALYSIS_CONFIG.poetry.titleCandidateMaxLength) return false;
    return !/[.,;:!?]/.test(trimmed);
}

/**
 * Poem lines with a leading title/author header removed. Blank lines are kept
 * so stanza boundaries survive.
 */
export function poetryBodyLines(text: string): string[] {
    const { headerMaxLineLength, minBodyLinesForTitleStrip } = ANALYSIS_CONFIG.poetry;
    let lines = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');

    const firstBlank = lines.findIndex(isBlank);
    if (firstBlank > 0 && firstBlank <= 5) {
        const header = lines
            .slice(0, firstBlank)
            .map(l => l.trim())
            .filter(l => l.length > 0);
        if (
            header.length >= 1 &&
            header.length <= 3 &&
            header.every(l => l.length <= headerMaxLineLength)
        ) {
            lines = lines.slice(firstBlank + 1);
        }
    }

    if (lines.filter(l => !isBlank(l)).length >= minBodyLinesForTitleStrip) {
        let lastHeader = -1;
        let found = 0;
        for (let i = 0; i < lines.length; i++) {
            if (isBlank(lines[i])) continue;
            if (found < 3 && isTitleCandidate(lines[i])) {
                lastHeader = i;
                found++;
                continue;
            }
            break;
        }
        if (lastHeader >= 0) lines = lines.slice(lastHeader + 1);
    }

    return lines;
}

/** Contiguous runs of non-blank lines */
export function splitStanzas(lines: readonly string[]): string[][] {
    const stanzas: string[][] = [];
    let current: string[] = [];
    for (const line of lines) {
        if (isBlank(line)) {
            if (current.length > 0) {
                stanzas.push(current);
                current = [];
            }
            continue;
        }
        current.push(line);
    }
    if (current.length > 0) stanzas.push(current);
    return stanzas;
}

/** Lowercased word runs of letters and apostrophes */
export function tokenizePoemWords(line: string): string[] {
    return line
        .toLowerCase()
        .split(/[^\p{L}']+/u)
        .filter(w => w.length > 0);
}
