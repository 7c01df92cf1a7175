/**
 * config.ts — Analysis thresholds and caps
 *
 * Every empirical constant the engine relies on lives here so callers and
 * tests can reason about a single source of truth.
 */

// ─── INPUT LIMITS ───────────────────────────────────────────────────────────

export const ANALYSIS_CONFIG = {
    /** Characters analysed before truncation kicks in */
    maxAnalysisLength: 500_000,

    /** Cap for every example-phrase list */
    maxExamples: 10,

    // ─── Structure ─────────────────────────────────────────────────────────

    longParagraphWords: 150,
    wordsPerPage: 250,
    screenplayLinesPerPage: 55,
    /** One sensory word expected per this many words */
    sensoryWordsPerDetail: 50,
    varietyStdDevScale: 5,
    maxReadingGrade: 18,

    // ─── Dialogue ──────────────────────────────────────────────────────────

    dialogue: {
        checks: 10,
        minAverageLength: 50,
        repetitionMinSegments: 5,
        repetitionThreshold: 2,
        maxFillerRatio: 0.2,
        minTagVariety: 5,
        maxPredictable: 3,
        predictableCollectLimit: 5,
        progressionMinSegments: 10,
        expositionLength: 100,
        expositionDivisor: 5,
        minConflictRatio: 0.2,
        minPunctuationKinds: 2,
        pacingStdDevScale: 30,
        minPacingScore: 60,
        screenplayCueMaxLength: 40,
    },

    // ─── Characters ────────────────────────────────────────────────────────

    characters: {
        maxSampledChapters: 18,
        sentenceExcerptLength: 120,
        maxBeliefEntries: 8,
        maxDecisionEntries: 6,
        maxLoopEntries: 8,
        interactionSectionWords: 1000,
        extractedNameMinCount: 3,
        extractedNameLimit: 10,
        significantPresenceThreshold: 3,
        significantInteractionThreshold: 2,
        minSignificant: 5,
        maxSignificant: 15,
        outlineLevelTwoLimit: 10,
    },

    // ─── Drift ─────────────────────────────────────────────────────────────

    drift: {
        /** Relative change below which a trend is reported as stable */
        stableDelta: 0.15,
        pronounMinRate: 0.005,
        alignmentGapDelta: 0.1,
    },

    // ─── Plot ──────────────────────────────────────────────────────────────

    plot: {
        windowWords: 100,
        minCurvePoints: 5,
        novelPeakThreshold: 0.4,
        novelSetupRise: 0.25,
        screenplayPeakThreshold: 0.45,
        screenplayReversalDelta: 0.3,
        screenplayPages: 120,
        novelReadingWpm: 225,
        screenplayWordsPerMinute: 165,
    },

    // ─── Format Detection ──────────────────────────────────────────────────

    format: {
        minLength: 500,
        screenplayProbability: 0.6,
        novelProbability: 0.4,
        charsPerPage: 3000,
    },

    // ─── Poetry ────────────────────────────────────────────────────────────

    poetry: {
        minLines: 2,
        headerMaxLineLength: 80,
        titleCandidateMaxLength: 60,
        minBodyLinesForTitleStrip: 8,
        longPoemLines: 80,
        longPoemStanzas: 10,
        excerptLength: 80,
    },
} as const;

export type AnalysisConfig = typeof ANALYSIS_CONFIG;
