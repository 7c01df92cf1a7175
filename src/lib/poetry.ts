/**
 * poetry.ts — Line- and stanza-level poem analysis
 *
 * Form (lengths, enjambment, caesura, rhyme, repetition), imagery, voice,
 * emotional trajectory, motifs, macro structure and reading mode. The
 * writer-facing commentary is built from these results in poetryCraft.ts.
 */

import type {
    CountedItem,
    PoetryEmotion,
    PoetryFormal,
    PoetryImagery,
    PoetryInsights,
    PoetryMode,
    PoetryMotif,
    PoetryStructure,
    PoetryVoice,
    SenseCategory,
} from '../types/analysis';
import {
    EMOTION_LEXICON,
    EXPOSITION_MARKERS,
    IMAGERY_LEXICON,
    MODE_LEXICON,
    POETRY_STOPWORDS,
    VOICE_LEXICON,
} from './lexicons';
import { buildWritersAnalysis, type CraftReading, type CraftSignals } from './poetryCraft';
import { poetryBodyLines, splitStanzas, tokenizePoemWords } from './segmentation';

const round3 = (n: number) => parseFloat(n.toFixed(3));
const clampUnit = (n: number) => Math.max(-1, Math.min(1, n));

// ═══════════════════════════════════════════════════════════
// 1. SHARED HELPERS
// ═══════════════════════════════════════════════════════════

export interface Poem {
    stanzas: string[][];
    lines: string[];
    tokensByLine: string[][];
}

export function readPoem(text: string): Poem {
    const stanzas = splitStanzas(poetryBodyLines(text));
    const lines = stanzas.flat();
    return { stanzas, lines, tokensByLine: lines.map(tokenizePoemWords) };
}

export const isContentWord = (token: string) => token.length > 2 && !POETRY_STOPWORDS.has(token);

function tally(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

/** Count descending, then text ascending */
export function topCounted(counts: ReadonlyMap<string, number>, limit: number, min: number): CountedItem[] {
    return [...counts.entries()]
        .filter(([, count]) => count >= min)
        .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
        .slice(0, limit)
        .map(([text, count]) => ({ text, count }));
}

function firstIndexOf(values: readonly number[], pick: (a: number, b: number) => boolean): number | undefined {
    if (values.length === 0) return undefined;
    let best = 0;
    for (let i = 1; i < values.length; i++) {
        if (pick(values[i], values[best])) best = i;
    }
    return best;
}

const mean = (values: readonly number[]) =>
    values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;

// ═══════════════════════════════════════════════════════════
// 2. FORMAL FEATURES
// ═══════════════════════════════════════════════════════════

const END_STOPS = new Set(['.', ',', ';', ':', '!', '?', '"', "'", '”', ')', '»', '—', '–']);

export function isEnjambed(line: string): boolean {
    const trimmed = line.trim();
    return trimmed.length > 0 && !END_STOPS.has(trimmed[trimmed.length - 1]);
}

/** A mid-line pause in the first half with real text after it */
export function hasCaesura(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed) return false;
    const half = Math.floor(trimmed.length / 2);
    const left = trimmed.slice(0, half);
    const right = trimmed.slice(half).trim();
    return /[—:;,]/.test(left) && right.length > 2;
}

/** Last three letters of the final word; `-` when there is none */
export function rhymeKey(line: string): string {
    const words = line.trim().split(/\s+/);
    const last = (words[words.length - 1] ?? '').toLowerCase().replace(/[^a-z']/g, '');
    return last.length === 0 ? '-' : last.slice(-3);
}

export function rhymeScheme(stanza: readonly string[]): string {
    const letters = new Map<string, string>();
    let scheme = '';
    for (const line of stanza) {
        const key = rhymeKey(line);
        if (key === '-') {
            scheme += '-';
            continue;
        }
        let letter = letters.get(key);
        if (letter === undefined) {
            letter = String.fromCharCode(65 + letters.size);
            letters.set(key, letter);
        }
        scheme += letter;
    }
    return scheme;
}

function sampleStdDev(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const avg = mean(values);
    return Math.sqrt(values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1));
}

function alliterationIn(tokens: readonly string[]): { initial: string; run: number } | undefined {
    let best: { initial: string; run: number } | undefined;
    let current = '';
    let run = 0;
    for (const token of tokens) {
        const initial = token.replace(/[^a-z]/g, '').charAt(0);
        if (initial.length > 0 && initial === current) {
            run++;
        } else {
            current = initial;
            run = initial.length > 0 ? 1 : 0;
        }
        if (run >= 2 && (!best || run > best.run)) best = { initial: current, run };
    }
    return best;
}

export function analyzeFormal(poem: Poem): PoetryFormal {
    const { stanzas, lines, tokensByLine } = poem;
    const lengths = lines.map(l => l.trim().length);

    const repetitions = new Map<string, number>();
    const openings = new Map<string, number>();
    const alliterationExamples: string[] = [];

    tokensByLine.forEach((tokens, index) => {
        for (const token of tokens) {
            if (isContentWord(token)) tally(repetitions, token);
        }

        const leading = tokens.filter(t => !POETRY_STOPWORDS.has(t));
        if (leading.length > 0) tally(openings, leading[0]);
        if (leading.length > 1) tally(openings, `${leading[0]} ${leading[1]}`);

        const found = alliterationIn(tokens);
        if (found && alliterationExamples.length < 6) {
            alliterationExamples.push(`Line ${index + 1}: repeated initial '${found.initial}' (${found.run}×)`);
        }
    });

    return {
        lineCount: lines.length,
        stanzaCount: stanzas.length,
        averageLineLength: Math.round(mean(lengths)),
        lineLengthStdDev: round3(sampleStdDev(lengths)),
        enjambmentRate: lines.length > 0 ? round3(lines.filter(isEnjambed).length / lines.length) : 0,
        caesuraRate: lines.length > 0 ? round3(lines.filter(hasCaesura).length / lines.length) : 0,
        rhymeSchemeByStanza: stanzas.map(rhymeScheme),
        repetitions: topCounted(repetitions, 8, 2),
        anaphora: topCounted(openings, 6, 2),
        alliterationExamples,
    };
}

// ═══════════════════════════════════════════════════════════
// 3. IMAGERY & VOICE
// ═══════════════════════════════════════════════════════════

const SENSES: readonly SenseCategory[] = ['visual', 'auditory', 'tactile', 'olfactory', 'gustatory', 'kinesthetic'];

export function senseOf(token: string): SenseCategory | undefined {
    return SENSES.find(sense => IMAGERY_LEXICON[sense].has(token));
}

export function dominantSenses(counts: Record<SenseCategory, number>): SenseCategory[] {
    return SENSES.filter(s => counts[s] > 0)
        .sort((a, b) => counts[b] - counts[a] || a.localeCompare(b))
        .slice(0, 2);
}

export function countSenses(tokens: readonly string[]): Record<SenseCategory, number> {
    const counts: Record<SenseCategory, number> = {
        visual: 0,
        auditory: 0,
        tactile: 0,
        olfactory: 0,
        gustatory: 0,
        kinesthetic: 0,
    };
    for (const token of tokens) {
        const sense = senseOf(token);
        if (sense) counts[sense]++;
    }
    return counts;
}

export function analyzeImagery(poem: Poem): PoetryImagery {
    const tokens = poem.tokensByLine.flat();
    const words = new Map<string, number>();
    for (const token of tokens) {
        if (senseOf(token)) tally(words, token);
    }
    const senseCounts = countSenses(tokens);
    return {
        senseCounts,
        dominantSenses: dominantSenses(senseCounts),
        topSensoryWords: topCounted(words, 8, 1),
    };
}

const hasQuote = (line: string) => /["“”]/.test(line);

export function analyzeVoice(poem: Poem): PoetryVoice {
    const { lines, tokensByLine } = poem;
    const tokens = tokensByLine.flat();
    const count = (lexicon: ReadonlySet<string>) => tokens.filter(t => lexicon.has(t)).length;

    const first = count(VOICE_LEXICON.firstPerson);
    const second = count(VOICE_LEXICON.secondPerson);
    const third = count(VOICE_LEXICON.thirdPerson);
    const narrativeVerbs = count(VOICE_LEXICON.narrativeVerbs);
    const quoteish = lines.filter(hasQuote).length;

    const hedges = new Map<string, number>();
    const modality = new Map<string, number>();
    for (const token of tokens) {
        if (VOICE_LEXICON.hedges.has(token)) tally(hedges, token);
        if (VOICE_LEXICON.modality.has(token)) tally(modality, token);
    }

    let likelyAddressMode = 'Observational / descriptive';
    if (second > first && second > 0) {
        likelyAddressMode = 'Address (speaker → you)';
    } else if (third > Math.max(first, second) && (narrativeVerbs >= 6 || quoteish >= 2)) {
        likelyAddressMode = 'Narrative / storytelling voice (speaker → scene)';
    } else if (first > 0) {
        likelyAddressMode = 'First-person stance (speaker-centered)';
    }

    const volta = tokensByLine.findIndex(t => t.some(token => VOICE_LEXICON.voltaCues.has(token)));

    return {
        firstPersonPronouns: first,
        secondPersonPronouns: second,
        thirdPersonPronouns: third,
        questions: lines.filter(l => l.trim().endsWith('?')).length,
        exclamations: lines.filter(l => l.trim().endsWith('!')).length,
        hedges: topCounted(hedges, 6, 1),
        modality: topCounted(modality, 6, 1),
        likelyAddressMode,
        ...(volta >= 0 && { candidateVoltaLine: volta + 1 }),
    };
}

// ═══════════════════════════════════════════════════════════
// 4. EMOTION
// ═══════════════════════════════════════════════════════════

export function scoreLine(line: string, tokens: readonly string[]): number {
    let pos = 0;
    let neg = 0;
    let amp = 0;
    for (const token of tokens) {
        if (EMOTION_LEXICON.positive.has(token)) pos++;
        if (EMOTION_LEXICON.negative.has(token)) neg++;
        if (EMOTION_LEXICON.intensifiers.has(token)) amp++;
    }
    let score = (pos - neg) / Math.max(1, pos + neg);
    if (line.trim().endsWith('!')) score = clampUnit(score * 1.15);
    if (amp > 0) score = clampUnit(score * (1 + Math.min(0.25, amp * 0.05)));
    return score;
}

/** 1-based positions of the three largest jumps, in reading order */
function notableShifts(scores: readonly number[]): number[] {
    const deltas = scores.slice(1).map((s, i) => Math.abs(s - scores[i]));
    return deltas
        .map((delta, offset) => ({ delta, offset }))
        .sort((a, b) => b.delta - a.delta)
        .slice(0, 3)
        .map(d => d.offset + 1)
        .sort((a, b) => a - b);
}

function withExtra(values: readonly number[], extra: number | undefined): number[] {
    if (extra === undefined || values.includes(extra)) return [...values];
    return [...values, extra].sort((a, b) => a - b);
}

/** 1-based stanza containing a 1-based line */
export function stanzaOfLine(stanzaLineCounts: readonly number[], line: number): number | undefined {
    let end = 0;
    for (let i = 0; i < stanzaLineCounts.length; i++) {
        end += stanzaLineCounts[i];
        if (line <= end) return i + 1;
    }
    return undefined;
}

export function analyzeEmotion(poem: Poem, voltaLine?: number): PoetryEmotion {
    const scores = poem.lines.map((line, i) => scoreLine(line, poem.tokensByLine[i]));
    const stanzaLineCounts = poem.stanzas.map(s => s.length);

    const stanzaScores: number[] = [];
    let cursor = 0;
    for (const count of stanzaLineCounts) {
        stanzaScores.push(mean(scores.slice(cursor, cursor + count)));
        cursor += count;
    }

    const peak = firstIndexOf(scores, (a, b) => a > b);
    const trough = firstIndexOf(scores, (a, b) => a < b);
    const peakStanza = firstIndexOf(stanzaScores, (a, b) => a > b);
    const troughStanza = firstIndexOf(stanzaScores, (a, b) => a < b);
    const deltas = scores.slice(1).map((s, i) => Math.abs(s - scores[i]));

    return {
        lineScores: scores.map(round3),
        stanzaScores: stanzaScores.map(round3),
        ...(peak !== undefined && { peakLine: peak + 1 }),
        ...(trough !== undefined && { troughLine: trough + 1 }),
        ...(peakStanza !== undefined && { peakStanza: peakStanza + 1 }),
        ...(troughStanza !== undefined && { troughStanza: troughStanza + 1 }),
        volatility: round3(mean(deltas)),
        shiftLines: withExtra(notableShifts(scores), voltaLine),
        shiftStanzas: withExtra(
            notableShifts(stanzaScores),
            voltaLine === undefined ? undefined : stanzaOfLine(stanzaLineCounts, voltaLine),
        ),
    };
}

// ═══════════════════════════════════════════════════════════
// 5. MOTIFS, STRUCTURE & MODE
// ═══════════════════════════════════════════════════════════

export function analyzeMotifs(poem: Poem): PoetryMotif {
    const motifs = new Map<string, number>();
    const bigrams = new Map<string, number>();
    for (const tokens of poem.tokensByLine) {
        const content = tokens.filter(isContentWord);
        content.forEach((token, i) => {
            tally(motifs, token);
            if (i > 0) tally(bigrams, `${content[i - 1]} ${token}`);
        });
    }
    return { topMotifs: topCounted(motifs, 10, 2), topBigrams: topCounted(bigrams, 6, 2) };
}

export function analyzeStructure(poem: Poem): PoetryStructure {
    const stanzaLineCounts = poem.stanzas.map(s => s.length);
    const longest = firstIndexOf(stanzaLineCounts, (a, b) => a > b);
    const shortest = firstIndexOf(stanzaLineCounts, (a, b) => a < b);
    return {
        stanzaLineCounts,
        ...(longest !== undefined && { longestStanzaIndex: longest }),
        ...(shortest !== undefined && { shortestStanzaIndex: shortest }),
    };
}

export interface ModeReading {
    mode: PoetryMode;
    rationale: string;
}

export function classifyMode(poem: Poem): ModeReading {
    const tokens = poem.tokensByLine.flat();
    const count = (lexicon: ReadonlySet<string>) => tokens.filter(t => lexicon.has(t)).length;

    const pastTense = tokens.filter(t => t.endsWith('ed') && t.length > 3).length;
    const quotedLines = poem.lines.filter(l => l.includes('"')).length;
    const questionLines = poem.lines.filter(l => l.includes('?')).length;

    const address = count(MODE_LEXICON.addressMarkers);
    const reflection = count(MODE_LEXICON.contemplationVerbs) + count(MODE_LEXICON.abstractMarkers);
    const action = count(MODE_LEXICON.narrativeMarkers) + Math.min(6, quotedLines) + Math.min(8, pastTense);
    const contemplation = reflection + Math.floor(address / 2) + 2 * questionLines;

    if (action >= contemplation + 10) {
        return {
            mode: 'narrative',
            rationale: 'Sequence markers, past-tense verbs and reported speech carry the poem forward as events.',
        };
    }
    if (contemplation >= action + 10) {
        return {
            mode: 'contemplative',
            rationale: 'Thinking verbs, abstractions and questions outweigh event markers; the poem meditates more than it narrates.',
        };
    }
    if (reflection + address >= action + 4) {
        return {
            mode: 'lyric',
            rationale: 'Address and reflection lead over plot; the poem centres a speaking voice and its feeling.',
        };
    }
    return {
        mode: 'hybrid',
        rationale: 'Narrative and reflective signals are close to balanced; the poem moves between telling and musing.',
    };
}

// ═══════════════════════════════════════════════════════════
// 6. CRAFT SIGNALS
// ═══════════════════════════════════════════════════════════

/** Jaccard overlap of two token sets */
export function overlap(a: readonly string[], b: readonly string[]): number {
    const left = new Set(a);
    const right = new Set(b);
    if (left.size === 0 && right.size === 0) return 0;
    let shared = 0;
    for (const token of left) {
        if (right.has(token)) shared++;
    }
    return shared / (left.size + right.size - shared);
}

/** Dominant senses of the opening, middle and closing thirds of the poem */
export function sensesByThird(tokensByLine: readonly string[][]): SenseCategory[][] {
    const n = tokensByLine.length;
    if (n === 0) return [];
    const third = Math.max(1, Math.floor(n / 3));
    const parts = [
        tokensByLine.slice(0, third),
        tokensByLine.slice(third, 2 * third),
        tokensByLine.slice(n - Math.max(1, n - 2 * third)),
    ];
    return parts.map(part => dominantSenses(countSenses(part.flat())));
}

export function collectCraftSignals(poem: Poem, reading: CraftReading): CraftSignals {
    const { lines, stanzas, tokensByLine } = poem;
    const tokens = tokensByLine.flat();
    const firstContent = (tokensByLine[0] ?? []).filter(isContentWord);
    const lastContent = (tokensByLine[tokensByLine.length - 1] ?? []).filter(isContentWord);
    const lastStanza = new Set((stanzas[stanzas.length - 1] ?? []).flatMap(tokenizePoemWords).filter(isContentWord));

    return {
        ...reading,
        lines,
        lastLineTokens: tokensByLine[tokensByLine.length - 1] ?? [],
        thirds: sensesByThird(tokensByLine),
        expositionCount: tokens.filter(t => EXPOSITION_MARKERS.has(t)).length,
        openingClosingOverlap: overlap(firstContent, lastContent),
        endingMotifs: reading.motif.topMotifs
            .slice(0, 6)
            .map(m => m.text)
            .filter(m => lastStanza.has(m)),
    };
}

// ═══════════════════════════════════════════════════════════
// 7. ENTRY POINT
// ═══════════════════════════════════════════════════════════

export function poemWordCount(poem: Poem): number {
    return poem.tokensByLine.reduce((sum, tokens) => sum + tokens.length, 0);
}

/** Full poem reading; undefined when there are no body lines at all */
export function analyzePoetry(poem: Poem): PoetryInsights | undefined {
    if (poem.lines.length === 0) return undefined;

    const formal = analyzeFormal(poem);
    const imagery = analyzeImagery(poem);
    const voice = analyzeVoice(poem);
    const emotion = analyzeEmotion(poem, voice.candidateVoltaLine);
    const motif = analyzeMotifs(poem);
    const structure = analyzeStructure(poem);
    const { mode, rationale } = classifyMode(poem);

    return {
        mode,
        modeRationale: rationale,
        formal,
        imagery,
        voice,
        emotion,
        motif,
        structure,
        writers: buildWritersAnalysis(
            collectCraftSignals(poem, { mode, formal, imagery, voice, emotion, motif, structure }),
        ),
    };
}
