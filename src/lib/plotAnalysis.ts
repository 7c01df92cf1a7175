/**
 * plotAnalysis.ts — Tension curve, plot points and structural diagnostics
 *
 * Novels are read for interior change across elastic spans; screenplays for
 * visible turns at fixed beats. Both share the rolling-window tension curve.
 */

import type {
    DocumentFormat,
    FormatDetection,
    IssueSeverity,
    PlotAnalysis,
    PlotPoint,
    StructuralIssue,
    TensionPoint,
} from '../types/analysis';
import { ANALYSIS_CONFIG } from './config';
import {
    NOVEL_KEY_BEATS,
    NOVEL_POINT_TYPES,
    PLOT_WORDS,
    SCREENPLAY_KEY_BEATS,
    SCREENPLAY_POINT_TYPES,
    type PlotPointTypeDef,
} from './lexicons';
import { cleanToken, tokenizeWords } from './segmentation';

const CFG = ANALYSIS_CONFIG.plot;

// ═══════════════════════════════════════════════════════════
// 1. TENSION CURVE
// ═══════════════════════════════════════════════════════════

export function sampleInterval(wordCount: number, format: DocumentFormat): number {
    return format === 'screenplay'
        ? Math.max(50, Math.min(200, Math.floor(wordCount / 20)))
        : Math.max(100, Math.min(500, Math.floor(wordCount / 10)));
}

export function windowTension(words: readonly string[], format: DocumentFormat): number {
    let score = 0;
    for (const word of words) {
        const clean = cleanToken(word);
        if (PLOT_WORDS.tension.has(clean)) score += 0.3;
        if (PLOT_WORDS.action.has(clean)) score += 0.2;
        if (PLOT_WORDS.revelation.has(clean)) score += 0.25;
        if (format === 'screenplay' ? PLOT_WORDS.visualAction.has(clean) : PLOT_WORDS.internalChange.has(clean)) {
            score += 0.15;
        }
    }
    return Math.min(1, score / 3);
}

export function buildTensionCurve(
    text: string,
    wordCount: number,
    format: DocumentFormat,
): TensionPoint[] {
    if (wordCount <= 0) return [];

    const words = tokenizeWords(text);
    const interval = sampleInterval(wordCount, format);
    const window: string[] = [];
    const curve: TensionPoint[] = [];

    words.forEach((word, index) => {
        window.push(word.toLowerCase());
        if (window.length > CFG.windowWords) window.shift();

        const seen = index + 1;
        if (seen % interval === 0 || seen === words.length) {
            curve.push({
                position: seen / wordCount,
                tensionLevel: windowTension(window, format),
                wordPosition: seen,
            });
        }
    });

    return curve;
}

// ═══════════════════════════════════════════════════════════
// 2. PLOT POINTS
// ═══════════════════════════════════════════════════════════

function typeAt(types: readonly PlotPointTypeDef[], position: number): PlotPointTypeDef {
    return types.find(t => position < t.upperBound) ?? types[types.length - 1];
}

function makePoint(
    def: PlotPointTypeDef,
    at: TensionPoint,
    description: string,
    screenplay: boolean,
    suggestion?: string,
): PlotPoint {
    return {
        type: def.name,
        emoji: def.emoji,
        wordPosition: at.wordPosition,
        percentagePosition: at.position,
        tensionLevel: at.tensionLevel,
        description,
        analysisQuestion: def.question,
        ...(suggestion !== undefined && { suggestedImprovement: suggestion }),
        isScreenplayPoint: screenplay,
    };
}

/** First curve point closest to the expected position */
function closestPoint(curve: readonly TensionPoint[], position: number): TensionPoint | undefined {
    let best: TensionPoint | undefined;
    for (const point of curve) {
        if (!best || Math.abs(point.position - position) < Math.abs(best.position - position)) {
            best = point;
        }
    }
    return best;
}

function ensureKeyBeats(
    points: PlotPoint[],
    curve: readonly TensionPoint[],
    keyBeats: readonly PlotPointTypeDef[],
    screenplay: boolean,
): void {
    const found = new Set(points.map(p => p.type));
    for (const beat of keyBeats) {
        if (found.has(beat.name)) continue;
        const at = closestPoint(curve, beat.expectedPosition);
        if (!at) continue;
        const description = screenplay
            ? `Expected at ~${Math.floor(beat.expectedPosition * CFG.screenplayPages)} pages`
            : `Expected ${beat.name}`;
        points.push(makePoint(beat, at, description, screenplay, beat.failure));
    }
}

export function identifyNovelPlotPoints(curve: readonly TensionPoint[]): PlotPoint[] {
    if (curve.length <= CFG.minCurvePoints) return [];
    const points: PlotPoint[] = [];

    for (let i = 1; i < curve.length - 1; i++) {
        const prev = curve[i - 1];
        const current = curve[i];
        const next = curve[i + 1];

        if (
            current.tensionLevel > prev.tensionLevel &&
            current.tensionLevel > next.tensionLevel &&
            current.tensionLevel > CFG.novelPeakThreshold
        ) {
            const def = typeAt(NOVEL_POINT_TYPES, current.position);
            points.push(makePoint(def, current, def.question, false));
        }

        if (
            current.tensionLevel < prev.tensionLevel &&
            next.tensionLevel > current.tensionLevel &&
            next.tensionLevel - current.tensionLevel > CFG.novelSetupRise
        ) {
            const def = typeAt(NOVEL_POINT_TYPES, current.position);
            points.push(makePoint(def, current, 'Setup before tension increase', false));
        }
    }

    ensureKeyBeats(points, curve, NOVEL_KEY_BEATS, false);
    return points.sort((a, b) => a.wordPosition - b.wordPosition);
}

export function identifyScreenplayPlotPoints(curve: readonly TensionPoint[]): PlotPoint[] {
    if (curve.length <= CFG.minCurvePoints) return [];
    const points: PlotPoint[] = [];

    for (let i = 1; i < curve.length - 1; i++) {
        const prev = curve[i - 1];
        const current = curve[i];
        const next = curve[i + 1];

        const isPeak =
            current.tensionLevel > prev.tensionLevel &&
            current.tensionLevel > next.tensionLevel &&
            current.tensionLevel > CFG.screenplayPeakThreshold;
        const isReversal =
            Math.abs(current.tensionLevel - prev.tensionLevel) > CFG.screenplayReversalDelta ||
            Math.abs(next.tensionLevel - current.tensionLevel) > CFG.screenplayReversalDelta;

        if (isPeak || isReversal) {
            const def = typeAt(SCREENPLAY_POINT_TYPES, current.position);
            points.push(makePoint(def, current, def.question, true));
        }
    }

    ensureKeyBeats(points, curve, SCREENPLAY_KEY_BEATS, true);
    return points.sort((a, b) => a.wordPosition - b.wordPosition);
}

export function findMissingPoints(
    points: readonly PlotPoint[],
    types: readonly PlotPointTypeDef[],
): string[] {
    const found = new Set(points.map(p => p.type));
    return types.filter(t => !found.has(t.name)).map(t => t.name);
}

// ═══════════════════════════════════════════════════════════
// 3. STRUCTURAL ISSUES
// ═══════════════════════════════════════════════════════════

export function variance(values: readonly number[]): number {
    if (values.length <= 1) return 0;
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    return values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
}

const mean = (values: readonly number[]) => values.reduce((a, b) => a + b, 0) / values.length;

export function detectNovelIssues(
    points: readonly PlotPoint[],
    curve: readonly TensionPoint[],
): StructuralIssue[] {
    const issues: StructuralIssue[] = [];

    // Long low-tension stretches are reported when the streak breaks
    let streak = 0;
    let streakStart = 0;
    for (const point of curve) {
        if (point.tensionLevel < 0.2) {
            if (streak === 0) streakStart = point.position;
            streak++;
            continue;
        }
        if (streak > 5) {
            issues.push({
                severity: streak > 10 ? 'major' : 'moderate',
                category: 'Excessive Inertia',
                description: 'Extended low-tension passage detected. Beautiful but potentially stagnant.',
                suggestion:
                    'Consider adding micro-conflicts, revelations, or thematic tensions to maintain reader engagement.',
                affectedRange: { start: streakStart, end: point.position },
            });
        }
        streak = 0;
    }

    const ignition = points.find(p => p.tensionLevel > 0.4);
    if (ignition && ignition.percentagePosition > 0.2) {
        issues.push({
            severity: ignition.percentagePosition > 0.3 ? 'major' : 'moderate',
            category: 'Late Plot Ignition',
            description: `Plot ignition appears late at ${Math.trunc(ignition.percentagePosition * 100)}%.`,
            suggestion: 'Consider introducing the inciting disruption earlier to hook readers.',
            affectedRange: { start: 0, end: ignition.percentagePosition },
        });
    }

    const midpoint = curve.filter(p => p.position >= 0.45 && p.position <= 0.55);
    if (midpoint.length > 0 && variance(midpoint.map(p => p.tensionLevel)) < 0.02) {
        issues.push({
            severity: 'moderate',
            category: 'Thematic Diffusion',
            description: 'Midpoint lacks clear reversal or redefinition of success.',
            suggestion: 'The midpoint should change what victory looks like for the protagonist.',
            affectedRange: { start: 0.45, end: 0.55 },
        });
    }

    return issues;
}

export function estimateRuntime(wordCount: number, format: DocumentFormat): number {
    const rate = format === 'screenplay' ? CFG.screenplayWordsPerMinute : CFG.novelReadingWpm;
    return Math.max(1, Math.floor(wordCount / rate));
}

export function detectScreenplayIssues(
    points: readonly PlotPoint[],
    curve: readonly TensionPoint[],
    wordCount: number,
): StructuralIssue[] {
    const issues: StructuralIssue[] = [];

    let flat = 0;
    let flatStart = 0;
    for (let i = 1; i < curve.length; i++) {
        if (Math.abs(curve[i].tensionLevel - curve[i - 1].tensionLevel) < 0.05) {
            if (flat === 0) flatStart = curve[i - 1].position;
            flat++;
            continue;
        }
        if (flat > 3) {
            issues.push({
                severity: flat > 6 ? 'major' : 'moderate',
                category: 'Repetitive Scenes',
                description: 'Sequence of scenes without visible turns detected.',
                suggestion:
                    'Each scene must turn, with someone gaining or losing leverage. Would cutting these scenes break causality?',
                affectedRange: { start: flatStart, end: curve[i].position },
            });
        }
        flat = 0;
    }

    const before = curve.filter(p => p.position >= 0.4 && p.position < 0.5);
    const after = curve.filter(p => p.position >= 0.5 && p.position <= 0.6);
    if (before.length > 0 && after.length > 0) {
        const beforeAvg = mean(before.map(p => p.tensionLevel));
        const afterAvg = mean(after.map(p => p.tensionLevel));
        if (afterAvg < beforeAvg * 0.9) {
            issues.push({
                severity: 'major',
                category: 'Midpoint Sag',
                description: 'Tension decreases after midpoint instead of escalating.',
                suggestion:
                    'Make the midpoint a visible reversal that raises the stakes and speeds the run toward the climax.',
                affectedRange: { start: 0.5, end: 0.6 },
            });
        }
    }

    if (points.filter(p => p.tensionLevel > 0.5).length < 3) {
        issues.push({
            severity: 'moderate',
            category: 'Passive Protagonist',
            description: 'Few high-tension action beats detected.',
            suggestion:
                'Let the protagonist make visible choices under pressure; action reveals character where dialogue alone cannot.',
            affectedRange: { start: 0, end: 1 },
        });
    }

    const minutes = estimateRuntime(wordCount, 'screenplay');
    if (minutes < 85 || minutes > 130) {
        issues.push({
            severity: minutes < 70 || minutes > 150 ? 'major' : 'minor',
            category: 'Pacing Problems',
            description: `Estimated runtime: ~${minutes} minutes. Feature films typically run 90-120 minutes.`,
            suggestion:
                minutes < 85
                    ? 'Consider expanding sequences or adding subplots.'
                    : 'Consider tightening scenes, each must justify its screen time.',
            affectedRange: { start: 0, end: 1 },
        });
    }

    return issues;
}

// ═══════════════════════════════════════════════════════════
// 4. FORMAT METRICS
// ═══════════════════════════════════════════════════════════

function countLexiconHits(text: string, lexicon: ReadonlySet<string>): Map<string, number> {
    const hits = new Map<string, number>();
    for (const word of text.toLowerCase().split(/\s+/)) {
        const clean = cleanToken(word);
        if (lexicon.has(clean)) hits.set(clean, (hits.get(clean) ?? 0) + 1);
    }
    return hits;
}

const total = (hits: Map<string, number>) => [...hits.values()].reduce((a, b) => a + b, 0);

export function internalChangeScore(text: string): number {
    return Math.min(100, total(countLexiconHits(text, PLOT_WORDS.internalChange)) * 2);
}

export function thematicResonance(text: string): number {
    const recurring = [...countLexiconHits(text, PLOT_WORDS.thematic).values()].filter(c => c >= 3);
    return Math.min(100, recurring.length * 15);
}

export function narrativeMomentum(curve: readonly TensionPoint[]): number {
    if (curve.length <= 2) return 50;
    let increases = 0;
    let decreases = 0;
    for (let i = 1; i < curve.length; i++) {
        if (curve[i].tensionLevel > curve[i - 1].tensionLevel) increases++;
        else decreases++;
    }
    const bonus = increases > 0 && decreases > 0 ? 10 : 0;
    return Math.min(100, Math.floor((increases / (increases + decreases)) * 80) + bonus);
}

export function visualCausality(text: string): number {
    const words = text.toLowerCase().split(/\s+/);
    const actions = total(countLexiconHits(text, PLOT_WORDS.visualAction));
    const wordsPerAction = words.length / Math.max(1, actions);
    if (wordsPerAction < 20) return 100;
    if (wordsPerAction < 50) return 80;
    if (wordsPerAction < 100) return 60;
    return 40;
}

export function sceneEfficiency(text: string, wordCount: number): number {
    const scenes = text.match(/(INT\.|EXT\.|INT\/EXT\.)/gi)?.length ?? 0;
    if (scenes === 0) return 50;
    const wordsPerScene = Math.floor(wordCount / scenes);
    if (wordsPerScene >= 100 && wordsPerScene <= 300) return 90;
    if (wordsPerScene < 100) return 60;
    if (wordsPerScene <= 500) return 70;
    return 40;
}

export function screenplayPacing(curve: readonly TensionPoint[]): number {
    if (curve.length <= CFG.minCurvePoints) return 50;
    let score = 50;

    const actOneBreak = curve.find(p => p.position >= 0.23 && p.position <= 0.27);
    if (actOneBreak && actOneBreak.tensionLevel > 0.4) score += 15;

    const actTwoBreak = curve.find(p => p.position >= 0.73 && p.position <= 0.77);
    if (actTwoBreak && actTwoBreak.tensionLevel > 0.6) score += 15;

    const finalStretch = curve.filter(p => p.position >= 0.75);
    if (finalStretch.length > 0 && mean(finalStretch.map(p => p.tensionLevel)) > 0.6) score += 20;

    return Math.min(100, score);
}

const SEVERITY_PENALTY: Record<IssueSeverity, number> = { minor: 3, moderate: 7, major: 12 };

export function structureScore(
    points: readonly PlotPoint[],
    missing: readonly string[],
    issues: readonly StructuralIssue[],
    format: DocumentFormat,
): number {
    let score = 100 - missing.length * (format === 'screenplay' ? 8 : 6);
    for (const issue of issues) score -= SEVERITY_PENALTY[issue.severity];

    const tensions = points.map(p => p.tensionLevel);
    if (tensions.length > 2 && variance(tensions) > 0.05) score += 10;

    return Math.max(0, Math.min(100, score));
}

// ═══════════════════════════════════════════════════════════
// 5. ENTRY POINT
// ═══════════════════════════════════════════════════════════

export function analyzePlot(text: string, wordCount: number, detection: FormatDetection): PlotAnalysis {
    const format = detection.format;
    const curve = buildTensionCurve(text, wordCount, format);
    const screenplay = format === 'screenplay';

    const plotPoints = screenplay ? identifyScreenplayPlotPoints(curve) : identifyNovelPlotPoints(curve);
    const missingPoints = findMissingPoints(
        plotPoints,
        screenplay ? SCREENPLAY_POINT_TYPES : NOVEL_POINT_TYPES,
    );
    const structuralIssues = screenplay
        ? detectScreenplayIssues(plotPoints, curve, wordCount)
        : detectNovelIssues(plotPoints, curve);

    return {
        documentFormat: format,
        formatConfidence: detection.confidence,
        plotPoints,
        overallTensionCurve: curve,
        structureScore: structureScore(plotPoints, missingPoints, structuralIssues, format),
        missingPoints,
        structuralIssues,
        internalChangeScore: screenplay ? 0 : internalChangeScore(text),
        thematicResonance: screenplay ? 0 : thematicResonance(text),
        narrativeMomentum: screenplay ? 0 : narrativeMomentum(curve),
        visualCausalityScore: screenplay ? visualCausality(text) : 0,
        sceneEfficiency: screenplay ? sceneEfficiency(text, wordCount) : 0,
        pacingScore: screenplay ? screenplayPacing(curve) : 0,
        estimatedRuntime: estimateRuntime(wordCount, format),
    };
}
