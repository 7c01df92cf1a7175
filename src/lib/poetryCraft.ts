/**
 * poetryCraft.ts — Writer-facing commentary on a poem's craft choices
 *
 * A pure rules function: measured signals in, seven buckets of short notes out.
 * Form context comes first because stanzaic forms explain some line-ending
 * statistics that would otherwise read as choices.
 */

import type {
    FormContext,
    PoetryEmotion,
    PoetryFormal,
    PoetryImagery,
    PoetryMode,
    PoetryMotif,
    PoetryStructure,
    PoetryVoice,
    SenseCategory,
    CountedItem,
    WritersAnalysis,
} from '../types/analysis';
import { ANALYSIS_CONFIG } from './config';
import { DIRECTION_WORDS } from './lexicons';

const CFG = ANALYSIS_CONFIG.poetry;

/** Results of the individual poem readers */
export interface CraftReading {
    mode: PoetryMode;
    formal: PoetryFormal;
    imagery: PoetryImagery;
    voice: PoetryVoice;
    emotion: PoetryEmotion;
    motif: PoetryMotif;
    structure: PoetryStructure;
}

export interface CraftSignals extends CraftReading {
    lines: string[];
    lastLineTokens: string[];
    /** Dominant senses of the opening, middle and closing thirds */
    thirds: SenseCategory[][];
    expositionCount: number;
    /** Jaccard overlap of content words in the first and last lines */
    openingClosingOverlap: number;
    endingMotifs: string[];
}

const pct = (value: number) => `≈${Math.round(value * 100)}%`;
const listCounted = (items: readonly CountedItem[], limit: number) =>
    items
        .slice(0, limit)
        .map(i => `${i.text} (${i.count}×)`)
        .join(', ');

// ═══════════════════════════════════════════════════════════
// 1. FORM CONTEXT
// ═══════════════════════════════════════════════════════════

/** ABAB or ABCB, with no unknown endings */
export function isBalladQuatrain(scheme: string): boolean {
    if (scheme.length !== 4 || scheme.includes('-')) return false;
    const [a, b, c, d] = scheme;
    if (a === c && b === d && a !== b) return true;
    return b === d && a !== b && c !== b;
}

export interface FormReading {
    context: FormContext;
    note?: string;
}

export function isLongPoem(formal: PoetryFormal): boolean {
    return formal.lineCount >= CFG.longPoemLines || formal.stanzaCount >= CFG.longPoemStanzas;
}

export function inferFormContext(
    mode: PoetryMode,
    structure: PoetryStructure,
    formal: PoetryFormal,
): FormReading {
    const counts = structure.stanzaLineCounts;
    if (counts.length === 0) return { context: 'mixed' };

    const stanzaicRatio = counts.filter(c => c === 4 || c === 6).length / counts.length;
    const quatrains = formal.rhymeSchemeByStanza.filter(s => s.length === 4);
    const balladRatio =
        quatrains.length === 0 ? 0 : quatrains.filter(isBalladQuatrain).length / quatrains.length;

    if (
        isLongPoem(formal) &&
        stanzaicRatio >= 0.6 &&
        (mode === 'narrative' || mode === 'hybrid') &&
        balladRatio >= 0.25
    ) {
        return {
            context: 'ballad-like',
            note: 'Form context: probably a stanzaic narrative in the ballad tradition. Quatrain and sextet structure accounts for much of the line-ending behaviour, so read those numbers as constraints of the form first.',
        };
    }
    if (stanzaicRatio >= 0.6) {
        return {
            context: 'stanzaic lyric',
            note: 'Form context: regular stanzas detected. Expect line endings to lean toward closure, since each stanza gives the reader a place to land.',
        };
    }
    if (formal.stanzaCount <= 2 || formal.enjambmentRate >= 0.55) {
        return {
            context: 'open form',
            note: 'Form context: open form or free verse. Line breaks carry more of the meaning here, so enjambment is more likely a deliberate choice.',
        };
    }
    return { context: 'mixed' };
}

// ═══════════════════════════════════════════════════════════
// 2. LINE ENDINGS
// ═══════════════════════════════════════════════════════════

export interface LineEndings {
    open: number;
    hard: number;
    dash: number;
    questions: number;
    exclamations: number;
}

export function profileLineEndings(lines: readonly string[]): LineEndings {
    const endings: LineEndings = { open: 0, hard: 0, dash: 0, questions: 0, exclamations: 0 };
    for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed.length === 0) continue;
        switch (trimmed[trimmed.length - 1]) {
            case '?':
                endings.questions++;
                endings.hard++;
                break;
            case '!':
                endings.exclamations++;
                endings.hard++;
                break;
            case '.':
            case ',':
            case ';':
            case ':':
                endings.hard++;
                break;
            case '—':
            case '–':
                endings.dash++;
                break;
            default:
                endings.open++;
        }
    }
    return endings;
}

function excerptLine(lines: readonly string[], lineNumber: number): string | undefined {
    const raw = lines[lineNumber - 1]?.trim() ?? '';
    if (raw.length === 0) return undefined;
    const chars = [...raw];
    return chars.length <= CFG.excerptLength ? raw : chars.slice(0, CFG.excerptLength).join('') + '…';
}

// ═══════════════════════════════════════════════════════════
// 3. BUCKETS
// ═══════════════════════════════════════════════════════════

function pressurePoints(s: CraftSignals, form: FormReading): string[] {
    const notes: string[] = [];
    const stanzaic = form.context === 'ballad-like' || form.context === 'stanzaic lyric';
    const { enjambmentRate, caesuraRate, averageLineLength, lineLengthStdDev, anaphora } = s.formal;

    if (form.note) notes.push(form.note);

    if (enjambmentRate >= 0.6) {
        notes.push(`High enjambment (${pct(enjambmentRate)}): closure keeps being postponed, so tension travels without being explained.`);
    } else if (enjambmentRate <= 0.3) {
        notes.push(
            stanzaic
                ? `Low enjambment (${pct(enjambmentRate)}): normal for stanzaic verse, where rhyme and cadence reward clean landings. A few run-on lines can add push; use them as pacing, not as rule-breaking for its own sake.`
                : `Low enjambment (${pct(enjambmentRate)}): lines land cleanly. For a burst of forward pressure, try a handful of deliberate run-on lines and listen to how the breath changes.`,
        );
    } else {
        notes.push(`Mixed closure (enjambment ${pct(enjambmentRate)}): tightening or loosening line endings controls when the reader gets to know something.`);
    }

    if (caesuraRate >= 0.25) {
        notes.push(`Frequent mid-line pauses (caesura ${pct(caesuraRate)}): the internal pivots are part of the music and suit reversals and second thoughts.`);
    }

    if (averageLineLength > 0) {
        const variability = lineLengthStdDev / Math.max(1, averageLineLength);
        if (variability >= 0.35) {
            notes.push(`Line lengths vary widely (σ/μ ≈ ${variability.toFixed(2)}): the shape of the lines is already modulating the feeling.`);
        }
    }

    if (anaphora.length > 0) {
        const top = listCounted(anaphora, 2);
        notes.push(
            form.context === 'ballad-like'
                ? `Refrain or anaphora: ${top}. In ballad narration repetition usually drives the poem; for emphasis, vary the refrain slightly at the turn instead of dropping it.`
                : `An opening pattern is set early (anaphora): ${top}. Breaking it once can mark the important moment.`,
        );
    }

    return notes;
}

function lineEnergy(s: CraftSignals, form: FormReading, endings: LineEndings): string[] {
    const total = Math.max(1, s.lines.length);
    const notes = [
        `Open line breaks: ${pct(endings.open / total)}; hard stops: ${pct(endings.hard / total)}. Line breaks act as the poem's timing edits.`,
    ];
    if (endings.dash > 0) {
        notes.push(`Dash endings (${endings.dash}) hold meaning in suspense and can refuse closure or invite a reread.`);
    }
    if (endings.questions > 0) {
        notes.push(`Questions (${endings.questions}) add uncertainty, which builds pressure without needing plot.`);
    }
    const volta = s.voice.candidateVoltaLine;
    if (volta !== undefined) {
        notes.push(
            form.context === 'ballad-like'
                ? `Candidate turn: line ${volta}. In stanzaic narrative the turn often falls on a stanza break or a repeated line; a refrain, a shift of tone or a suddenly plain sentence can mark it.`
                : `Candidate turn: line ${volta}. To sharpen the pivot, tighten the syntax just before it and break the pattern on the turn itself.`,
        );
    }
    return notes;
}

function imageLogic(s: CraftSignals): string[] {
    const notes: string[] = [];
    const describe = (senses: readonly SenseCategory[]) => (senses.length > 0 ? senses.join(', ') : '(none detected)');

    if (s.thirds.length === 3) {
        notes.push(`Dominant senses from start to middle to end: ${s.thirds.map(describe).join(' → ')}.`);
    }
    if (s.imagery.dominantSenses.length > 0) {
        notes.push(`Overall dominant senses: ${s.imagery.dominantSenses.join(', ')}.`);
    }
    if (s.motif.topMotifs.length > 0) {
        notes.push(`Recurring image words: ${listCounted(s.motif.topMotifs, 6)}. Their order can escalate them, soften them or make them strange.`);
    }
    return notes;
}

function voiceManagement(s: CraftSignals, form: FormReading): string[] {
    const { voice } = s;
    const notes = [
        `Address mode: ${voice.likelyAddressMode}. Pronouns (1st/2nd/3rd): ${voice.firstPersonPronouns}/${voice.secondPersonPronouns}/${voice.thirdPersonPronouns}.`,
    ];
    if (form.context === 'ballad-like') {
        notes.push('Ballads often frame a teller speaking to a listener, so the pronoun counts describe a delivery stance rather than a persona.');
    }
    if (voice.modality.length > 0) {
        notes.push(`Modal pressure: ${listCounted(voice.modality, 4)}. Certainty lends authority; withholding it exposes the speaker.`);
    }
    if (voice.hedges.length > 0) {
        notes.push(`Hedges: ${listCounted(voice.hedges, 4)}. Hedging can suggest fear, irony or self-protection.`);
    }
    if (voice.exclamations === 0 && voice.questions === 0) {
        notes.push('No lines end in ? or !, so the tone reads controlled. Restraint like this can make hard material land harder.');
    }
    return notes;
}

function endingJob(s: CraftSignals): string {
    const last = s.lines[s.lines.length - 1]?.trim() ?? '';
    switch (last[last.length - 1]) {
        case '?':
            return 'Ends suspended on a question.';
        case '!':
            return 'Ends on a surge (exclamation).';
        case '—':
        case '–':
            return 'Ends on a dash, refusing to settle.';
    }
    const window = s.emotion.lineScores.slice(-3);
    const average = window.length === 0 ? 0 : window.reduce((a, b) => a + b, 0) / window.length;
    if (average >= 0.2) return 'Ends with an emotional lift.';
    if (average <= -0.2) return 'Ends darkening into unease.';
    return 'Ends in a steady state without clear resolution.';
}

function emotionalArc(s: CraftSignals, form: FormReading): string[] {
    const { emotion, lines } = s;
    const notes: string[] = [];

    if (s.mode === 'narrative' || form.context === 'ballad-like') {
        notes.push('The affect curve is estimated from word choice. In narrative poems it tends to follow the intensity of events more than the speaker\'s mood.');
    }

    if (isLongPoem(s.formal) && emotion.stanzaScores.length > 0) {
        if (emotion.peakStanza !== undefined) notes.push(`Peak intensity around stanza ${emotion.peakStanza}.`);
        if (emotion.troughStanza !== undefined) notes.push(`Lowest point around stanza ${emotion.troughStanza}.`);
        if (emotion.shiftStanzas.length > 0) {
            notes.push(`Largest emotional turns by stanza: ${emotion.shiftStanzas.slice(0, 6).join(', ')}.`);
        }
        const peak = emotion.peakLine === undefined ? undefined : excerptLine(lines, emotion.peakLine);
        if (emotion.peakLine !== undefined && peak !== undefined) {
            notes.push(`Near the peak (line ${emotion.peakLine}): "${peak}"`);
        }
        const trough = emotion.troughLine === undefined ? undefined : excerptLine(lines, emotion.troughLine);
        if (emotion.troughLine !== undefined && trough !== undefined) {
            notes.push(`Near the low point (line ${emotion.troughLine}): "${trough}"`);
        }
    } else {
        if (emotion.peakLine !== undefined) notes.push(`Peak intensity around line ${emotion.peakLine}.`);
        if (emotion.troughLine !== undefined) notes.push(`Lowest point around line ${emotion.troughLine}.`);
        if (emotion.shiftLines.length > 0) {
            notes.push(`Notable emotional turns near lines: ${emotion.shiftLines.slice(0, 6).join(', ')}.`);
        }
        const peak = emotion.peakLine === undefined ? undefined : excerptLine(lines, emotion.peakLine);
        if (peak !== undefined) notes.push(`Near the peak: "${peak}"`);
    }

    notes.push(endingJob(s));
    return notes;
}

function compressionChoices(s: CraftSignals, form: FormReading): string[] {
    const notes: string[] = [];
    if (s.expositionCount <= 1) {
        notes.push('Few explanation markers: the poem leans on implication rather than argument.');
    } else if (form.context === 'ballad-like') {
        notes.push(`Explanation markers found (${s.expositionCount}). Ballads and parables often spell out cause on purpose; if a passage drags, fold one aside into a repeated line rather than cutting clarity the theme needs.`);
    } else {
        notes.push(`Explanation markers found (${s.expositionCount}). If the poem feels over-explained, compress one causal bridge and keep the logic.`);
    }

    const average = s.formal.averageLineLength;
    if (average > 0 && average <= 35) {
        notes.push(`Short lines (avg ${average} chars) concentrate meaning and let silence work.`);
    } else if (average >= 70) {
        notes.push(`Long lines (avg ${average} chars) read closer to prose; selective cuts would raise the pressure.`);
    }
    return notes;
}

function endingStrategy(s: CraftSignals): string[] {
    const notes: string[] = [];
    if (s.openingClosingOverlap >= 0.18) {
        notes.push(`The ending echoes the opening (keyword overlap ≈ ${Math.round(s.openingClosingOverlap * 100)}%), which draws the reader back to the start.`);
    } else {
        notes.push('The ending resists the opening (little keyword overlap) and can reframe the first line without mirroring it.');
    }

    const lastLine = (s.lines[s.lines.length - 1] ?? '').toLowerCase();
    if (lastLine.split(' is ').length - 1 >= 2) {
        notes.push('The ending turns aphoristic with repeated "is" claims, which can overpower the motifs.');
    }
    if (s.endingMotifs.length > 0) {
        notes.push(`The ending returns to established motifs: ${s.endingMotifs.slice(0, 3).join(', ')}.`);
    }
    if (s.lastLineTokens.some(t => DIRECTION_WORDS.has(t))) {
        notes.push('The last line points somewhere. Endings that point tend to outlast endings that conclude.');
    }
    return notes;
}

export function buildWritersAnalysis(signals: CraftSignals): WritersAnalysis {
    const form = inferFormContext(signals.mode, signals.structure, signals.formal);
    const endings = profileLineEndings(signals.lines);

    return {
        formContext: form.context,
        pressurePoints: pressurePoints(signals, form),
        lineEnergy: lineEnergy(signals, form, endings),
        imageLogic: imageLogic(signals),
        voiceManagement: voiceManagement(signals, form),
        emotionalArc: emotionalArc(signals, form),
        compressionChoices: compressionChoices(signals, form),
        endingStrategy: endingStrategy(signals),
    };
}
