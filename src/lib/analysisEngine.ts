/**
 * analysisEngine.ts — Single entry point for manuscript analysis
 *
 * Truncates, segments and fans the text out to every analyser, then assembles
 * one plain-data AnalysisResults. Synchronous and stateless between calls.
 */

import type {
    AnalysisOptions,
    AnalysisResults,
    AnalysisWarning,
    FormatDetection,
    PlotAnalysis,
    PoetryInsights,
} from '../types/analysis';
import {
    buildBeliefShiftMatrix,
    buildCharacterContext,
    buildDecisionBeliefLoop,
    buildDecisionConsequenceChain,
    computeCharacterInteractions,
    computeCharacterPresence,
} from './characterAnalytics';
import { analyzeAlignment, analyzeLanguageDrift, analyzeRelationships } from './characterDrift';
import { resolveAnalysisCharacters } from './characterRegistry';
import { ANALYSIS_CONFIG } from './config';
import {
    countSensoryDetails,
    detectAdverbs,
    detectCliches,
    detectFilterWords,
    detectPassiveVoice,
    detectWeakVerbs,
    isMissingSensoryDetail,
} from './detectors';
import { EMPTY_DIALOGUE_QUALITY, extractDialogue, scoreDialogueQuality, type DialogueQuality } from './dialogue';
import { defaultFormatDetector } from './formatDetector';
import { trackSync } from './performance';
import { analyzePlot } from './plotAnalysis';
import { analyzePoetry, poemWordCount, readPoem } from './poetry';
import { dialoguePercentage, estimatePageCount, readingLevel, sentenceVariety } from './readability';
import { countSentences, countWords, paragraphStats, splitIntoChapters, tokenizeWords } from './segmentation';

function resolveMaxLength(requested?: number): number {
    if (requested === undefined || !Number.isFinite(requested) || requested <= 0) {
        return ANALYSIS_CONFIG.maxAnalysisLength;
    }
    return Math.floor(requested);
}

// ═══════════════════════════════════════════════════════════
// 1. BRANCHES
// ═══════════════════════════════════════════════════════════

interface BranchResult {
    dialogue: DialogueQuality;
    dialogueWords: number;
    plotAnalysis?: PlotAnalysis;
    poetryInsights?: PoetryInsights;
    poemWords?: number;
}

function runProseBranch(text: string, detection: FormatDetection): BranchResult {
    const segments = trackSync('analysis.dialogue', () =>
        extractDialogue(text, detection.format === 'screenplay'),
    );
    const dialogue = scoreDialogueQuality(segments, text);
    const dialogueWords = segments.reduce((sum, s) => sum + countWords(s), 0);

    const words = countWords(text);
    const plotAnalysis =
        words > 0 ? trackSync('analysis.plot', () => analyzePlot(text, words, detection)) : undefined;

    return { dialogue, dialogueWords, plotAnalysis };
}

function runPoetryBranch(text: string, fullText: string, warnings: AnalysisWarning[]): BranchResult {
    const poem = readPoem(text);
    if (poem.lines.length < ANALYSIS_CONFIG.poetry.minLines) {
        warnings.push({
            code: 'insufficient-poetry-content',
            message: `Poetry analysis needs at least ${ANALYSIS_CONFIG.poetry.minLines} lines; found ${poem.lines.length}.`,
        });
    }
    return {
        dialogue: { ...EMPTY_DIALOGUE_QUALITY },
        dialogueWords: 0,
        poetryInsights: trackSync('analysis.poetry', () => analyzePoetry(poem)),
        poemWords: poemWordCount(fullText === text ? poem : readPoem(fullText)),
    };
}

// ═══════════════════════════════════════════════════════════
// 2. ENTRY POINT
// ═══════════════════════════════════════════════════════════

/**
 * Analyse a manuscript.
 *
 * Text longer than `maxAnalysisLength` is cut before analysis and flagged with
 * an `input-truncated` warning; `wordCount` still reflects the full text.
 */
export function analyzeText(text: string, options: AnalysisOptions = {}): AnalysisResults {
    const style = options.style ?? 'prose';
    return trackSync('analysis.total', () => runAnalysis(text, options), {
        textLength: text.length,
        style,
    });
}

export const analyze = analyzeText;

function runAnalysis(text: string, options: AnalysisOptions): AnalysisResults {
    const style = options.style ?? 'prose';
    const warnings: AnalysisWarning[] = [];

    const maxLength = resolveMaxLength(options.maxAnalysisLength);
    const truncated = text.length > maxLength;
    const source = truncated ? text.slice(0, maxLength) : text;
    if (truncated) {
        console.warn(`[Analysis] Input truncated from ${text.length} to ${maxLength} characters`);
        warnings.push({
            code: 'input-truncated',
            message: `Only the first ${maxLength} of ${text.length} characters were analysed.`,
        });
    }

    const fullWordCount = countWords(text);

    const { tokens, sentenceCount, paragraphs } = trackSync('analysis.segment', () => ({
        tokens: tokenizeWords(source),
        sentenceCount: countSentences(source),
        paragraphs: paragraphStats(source),
    }));

    const detectors = trackSync('analysis.detectors', () => {
        const sensoryDetailCount = countSensoryDetails(source);
        return {
            passive: detectPassiveVoice(source),
            adverbs: detectAdverbs(tokens),
            weakVerbs: detectWeakVerbs(tokens),
            cliches: detectCliches(source),
            filterWords: detectFilterWords(tokens),
            sensoryDetailCount,
            missingSensoryDetail: isMissingSensoryDetail(fullWordCount, sensoryDetailCount),
        };
    });

    const readability = trackSync('analysis.readability', () => ({
        readingLevel: readingLevel(source, fullWordCount),
        variety: sentenceVariety(source),
    }));

    let detection: FormatDetection = { format: 'novel', confidence: 0.5 };
    if (style === 'screenplay') {
        detection = { format: 'screenplay', confidence: 1 };
    } else if (style === 'prose') {
        const detector = options.formatDetector ?? defaultFormatDetector;
        detection = trackSync('analysis.format', () => detector.detectFormat(source));
    }

    const branch = style === 'poetry' ? runPoetryBranch(source, text, warnings) : runProseBranch(source, detection);
    const wordCount = branch.poemWords !== undefined && branch.poemWords > 0 ? branch.poemWords : fullWordCount;

    const characters = trackSync('analysis.characters', () => {
        const names = resolveAnalysisCharacters(source, {
            registry: options.characterRegistry,
            candidates: options.characterNames,
            extractNamesWithoutRegistry: options.extractNamesWithoutRegistry,
        });
        const chapters = splitIntoChapters(source, options.outline);
        const contexts = names.map(name => buildCharacterContext(name, options.characterRegistry));
        const mapping = options.pageMapping;

        return {
            names,
            chapters,
            contexts,
            beliefShiftMatrices: contexts.map(c => buildBeliefShiftMatrix(c, chapters, mapping)),
            decisionConsequenceChains: contexts.map(c => buildDecisionConsequenceChain(c, chapters, mapping)),
            decisionBeliefLoops: contexts.map(c => buildDecisionBeliefLoop(c, chapters, mapping)),
            characterPresence: computeCharacterPresence(names, chapters),
            characterInteractions: computeCharacterInteractions(names, source),
        };
    });

    const drift = trackSync('analysis.drift', () => ({
        languageDriftData: characters.contexts.map(c => analyzeLanguageDrift(c, characters.chapters)),
        internalExternalAlignment: characters.contexts.map(c => analyzeAlignment(c, characters.chapters)),
        relationshipEvolutionData: analyzeRelationships(characters.contexts, characters.chapters),
    }));

    const { dialogue } = branch;

    return {
        wordCount,
        sentenceCount,
        paragraphCount: paragraphs.paragraphCount,
        averageParagraphLength: paragraphs.averageParagraphLength,
        longParagraphs: paragraphs.longParagraphs,
        pageCount: estimatePageCount({
            text: source,
            wordCount,
            format: detection.format,
            override: options.pageCountOverride,
        }),

        passiveVoiceCount: detectors.passive.count,
        passiveVoicePhrases: detectors.passive.examples,
        adverbCount: detectors.adverbs.count,
        adverbPhrases: detectors.adverbs.examples,
        sensoryDetailCount: detectors.sensoryDetailCount,
        missingSensoryDetail: detectors.missingSensoryDetail,
        weakVerbCount: detectors.weakVerbs.count,
        weakVerbPhrases: detectors.weakVerbs.examples,
        clicheCount: detectors.cliches.count,
        clichePhrases: detectors.cliches.examples,
        filterWordCount: detectors.filterWords.count,
        filterWordPhrases: detectors.filterWords.examples,

        readingLevel: readability.readingLevel,
        sentenceVarietyScore: readability.variety.score,
        sentenceLengths: readability.variety.sentenceLengths,

        dialoguePercentage: dialoguePercentage(branch.dialogueWords, tokens.length),
        dialogueQualityScore: dialogue.qualityScore,
        dialogueSegmentCount: dialogue.segmentCount,
        dialogueFillerCount: dialogue.fillerCount,
        dialogueRepetitionScore: dialogue.repetitionScore,
        dialogueTagVariety: dialogue.tagVariety,
        dialoguePredictablePhrases: dialogue.predictablePhrases,
        dialogueExpositionCount: dialogue.expositionCount,
        dialoguePacingScore: dialogue.pacingScore,
        hasDialogueConflict: dialogue.hasConflict,

        documentFormat: detection.format,
        ...(branch.plotAnalysis && { plotAnalysis: branch.plotAnalysis }),

        analyzedCharacters: characters.names,
        decisionBeliefLoops: characters.decisionBeliefLoops,
        characterInteractions: characters.characterInteractions,
        characterPresence: characters.characterPresence,
        beliefShiftMatrices: characters.beliefShiftMatrices,
        decisionConsequenceChains: characters.decisionConsequenceChains,
        relationshipEvolutionData: drift.relationshipEvolutionData,
        internalExternalAlignment: drift.internalExternalAlignment,
        languageDriftData: drift.languageDriftData,

        ...(branch.poetryInsights && { poetryInsights: branch.poetryInsights }),

        truncated,
        warnings,
    };
}
