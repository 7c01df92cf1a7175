/**
 * analysis.ts — Manuscript Analysis Type Definitions
 *
 * Options accepted by the engine and the plain-data result bundle it returns.
 * Everything here is JSON-serialisable so results can be cached and sent over HTTP.
 */

// ─── Inputs ────────────────────────────────────────────────────────────────────

export type AnalysisStyle = 'prose' | 'screenplay' | 'poetry';

export type DocumentFormat = 'novel' | 'screenplay';

export interface OutlineEntry {
    title: string;
    level: number;
    rangeStart: number;
    rangeEnd: number;
}

/** Maps a character offset in the text to the page it renders on. */
export interface PageMappingEntry {
    location: number;
    page: number;
}

export interface CharacterRegistry {
    canonicalKeys(): string[];
    aliasesFor(key: string): string[];
}

export interface CharacterSnapshot {
    characters: Array<{ name: string; aliases?: string[] }>;
}

export interface FormatDetection {
    format: DocumentFormat;
    confidence: number;
}

export interface FormatDetector {
    detectFormat(text: string): FormatDetection;
}

export interface AnalysisOptions {
    style?: AnalysisStyle;
    outline?: OutlineEntry[];
    pageMapping?: PageMappingEntry[];
    pageCountOverride?: number;
    characterRegistry?: CharacterRegistry;
    /** Names the caller wants analysed; validated against the registry when one is present. */
    characterNames?: string[];
    /** Opt-in: guess names from capitalised words when no registry or names are supplied. */
    extractNamesWithoutRegistry?: boolean;
    formatDetector?: FormatDetector;
    maxAnalysisLength?: number;
}

// ─── Segmentation ──────────────────────────────────────────────────────────────

export interface Chapter {
    number: number;
    title?: string;
    text: string;
    startOffset: number;
}

// ─── Character Analytics ───────────────────────────────────────────────────────

export interface BeliefEntry {
    chapter: number;
    chapterPage?: number;
    coreBelief: string;
    evidence: string;
    counterpressure: string;
}

export interface BeliefShiftMatrix {
    characterName: string;
    entries: BeliefEntry[];
}

export interface ChainEntry {
    chapter: number;
    chapterPage?: number;
    decision: string;
    immediateOutcome: string;
    longTermEffect: string;
}

export interface DecisionConsequenceChain {
    characterName: string;
    entries: ChainEntry[];
}

export type ArcQuality =
    | 'Insufficient Data'
    | 'Flat Arc - Beliefs unchanging'
    | 'Developing Arc - Some changes'
    | 'Evolving Arc - Clear pattern change';

export interface LoopEntry {
    chapter: number;
    chapterPage?: number;
    pressure: string;
    beliefInPlay: string;
    decision: string;
    outcome: string;
    beliefShift: string;
}

export interface DecisionBeliefLoop {
    characterName: string;
    entries: LoopEntry[];
    arcQuality: ArcQuality;
}

export interface CharacterPresence {
    characterName: string;
    /** Chapter number → mention count; chapters without mentions are omitted. */
    chapterPresence: Record<number, number>;
}

export interface CharacterInteraction {
    character1: string;
    character2: string;
    coAppearances: number;
    /** Zero-based indices of the 1000-word sections where both names appear. */
    sections: number[];
    relationshipStrength: number;
}

// ─── Character Drift ───────────────────────────────────────────────────────────

export interface LanguageMetrics {
    chapter: number;
    pronounI: number;
    pronounWe: number;
    modalMust: number;
    modalChoice: number;
    emotionalDensity: number;
    avgSentenceLength: number;
    certaintyScore: number;
}

export type PronounShift = 'I → We' | 'We → I' | 'Stable';
export type ModalShift = 'Obligation → Choice' | 'Choice → Obligation' | 'Stable';
export type Trend = 'Increasing' | 'Decreasing' | 'Stable';
export type SentenceTrend = 'Longer' | 'Shorter' | 'Stable';
export type CertaintyTrend = 'More Certain' | 'Less Certain' | 'Stable';

export interface DriftSummary {
    pronounShift: PronounShift;
    modalShift: ModalShift;
    emotionalTrend: Trend;
    sentenceTrend: SentenceTrend;
    certaintyTrend: CertaintyTrend;
}

export interface LanguageDriftData {
    characterName: string;
    metrics: LanguageMetrics[];
    drift: DriftSummary;
}

export interface AlignmentPoint {
    chapter: number;
    innerTruth: number;
    outerBehavior: number;
    innerLabel: string;
    outerLabel: string;
}

export type GapTrend =
    | 'Widening (Denial/Repression)'
    | 'Stabilizing (Coping)'
    | 'Closing (Integration)'
    | 'Closing (Collapse)'
    | 'Fluctuating';

export interface InternalExternalAlignmentData {
    characterName: string;
    points: AlignmentPoint[];
    gapTrend: GapTrend;
}

export type PowerDirection = 'balanced' | 'fromToTo' | 'toToFrom';

export interface RelationshipNode {
    character: string;
    emotionalInvestment: number;
}

export interface RelationshipEvolutionPoint {
    chapter: number;
    trustLevel: number;
    description: string;
}

export interface RelationshipEdge {
    from: string;
    to: string;
    trustLevel: number;
    powerDirection: PowerDirection;
    evolution: RelationshipEvolutionPoint[];
}

export interface RelationshipEvolutionData {
    nodes: RelationshipNode[];
    edges: RelationshipEdge[];
}

// ─── Plot ──────────────────────────────────────────────────────────────────────

export interface TensionPoint {
    position: number;
    tensionLevel: number;
    wordPosition: number;
}

export interface PlotPoint {
    type: string;
    emoji: string;
    wordPosition: number;
    percentagePosition: number;
    tensionLevel: number;
    description: string;
    analysisQuestion: string;
    suggestedImprovement?: string;
    isScreenplayPoint: boolean;
}

export type IssueSeverity = 'minor' | 'moderate' | 'major';

export type IssueCategory =
    | 'Excessive Inertia'
    | 'Late Plot Ignition'
    | 'Thematic Diffusion'
    | 'Repetitive Scenes'
    | 'Midpoint Sag'
    | 'Passive Protagonist'
    | 'Pacing Problems';

export interface StructuralIssue {
    severity: IssueSeverity;
    category: IssueCategory;
    description: string;
    suggestion: string;
    affectedRange: { start: number; end: number };
}

export interface PlotAnalysis {
    documentFormat: DocumentFormat;
    formatConfidence: number;
    plotPoints: PlotPoint[];
    overallTensionCurve: TensionPoint[];
    structureScore: number;
    missingPoints: string[];
    structuralIssues: StructuralIssue[];
    internalChangeScore: number;
    thematicResonance: number;
    narrativeMomentum: number;
    visualCausalityScore: number;
    sceneEfficiency: number;
    pacingScore: number;
    estimatedRuntime: number;
}

// ─── Poetry ────────────────────────────────────────────────────────────────────

export interface CountedItem {
    text: string;
    count: number;
}

export interface PoetryFormal {
    lineCount: number;
    stanzaCount: number;
    averageLineLength: number;
    lineLengthStdDev: number;
    enjambmentRate: number;
    caesuraRate: number;
    rhymeSchemeByStanza: string[];
    repetitions: CountedItem[];
    anaphora: CountedItem[];
    alliterationExamples: string[];
}

export type SenseCategory =
    | 'visual'
    | 'auditory'
    | 'tactile'
    | 'olfactory'
    | 'gustatory'
    | 'kinesthetic';

export interface PoetryImagery {
    senseCounts: Record<SenseCategory, number>;
    dominantSenses: SenseCategory[];
    topSensoryWords: CountedItem[];
}

export interface PoetryVoice {
    firstPersonPronouns: number;
    secondPersonPronouns: number;
    thirdPersonPronouns: number;
    questions: number;
    exclamations: number;
    hedges: CountedItem[];
    modality: CountedItem[];
    likelyAddressMode: string;
    candidateVoltaLine?: number;
}

export interface PoetryEmotion {
    lineScores: number[];
    stanzaScores: number[];
    peakLine?: number;
    troughLine?: number;
    peakStanza?: number;
    troughStanza?: number;
    volatility: number;
    shiftLines: number[];
    shiftStanzas: number[];
}

export interface PoetryMotif {
    topMotifs: CountedItem[];
    topBigrams: CountedItem[];
}

export interface PoetryStructure {
    stanzaLineCounts: number[];
    longestStanzaIndex?: number;
    shortestStanzaIndex?: number;
}

export type PoetryMode = 'narrative' | 'contemplative' | 'lyric' | 'hybrid';

export type FormContext = 'ballad-like' | 'stanzaic lyric' | 'open form' | 'mixed';

export interface WritersAnalysis {
    formContext: FormContext;
    pressurePoints: string[];
    lineEnergy: string[];
    imageLogic: string[];
    voiceManagement: string[];
    emotionalArc: string[];
    compressionChoices: string[];
    endingStrategy: string[];
}

export interface PoetryInsights {
    mode: PoetryMode;
    modeRationale: string;
    formal: PoetryFormal;
    imagery: PoetryImagery;
    voice: PoetryVoice;
    emotion: PoetryEmotion;
    motif: PoetryMotif;
    structure: PoetryStructure;
    writers: WritersAnalysis;
}

// ─── Results ───────────────────────────────────────────────────────────────────

export type AnalysisWarningCode = 'input-truncated' | 'insufficient-poetry-content';

export interface AnalysisWarning {
    code: AnalysisWarningCode;
    message: string;
}

export interface AnalysisResults {
    wordCount: number;
    sentenceCount: number;
    paragraphCount: number;
    averageParagraphLength: number;
    longParagraphs: number[];
    pageCount: number;

    passiveVoiceCount: number;
    passiveVoicePhrases: string[];
    adverbCount: number;
    adverbPhrases: string[];
    sensoryDetailCount: number;
    missingSensoryDetail: boolean;
    weakVerbCount: number;
    weakVerbPhrases: string[];
    clicheCount: number;
    clichePhrases: string[];
    filterWordCount: number;
    filterWordPhrases: string[];

    readingLevel: string;
    sentenceVarietyScore: number;
    sentenceLengths: number[];

    dialoguePercentage: number;
    dialogueQualityScore: number;
    dialogueSegmentCount: number;
    dialogueFillerCount: number;
    dialogueRepetitionScore: number;
    dialogueTagVariety: number;
    dialoguePredictablePhrases: string[];
    dialogueExpositionCount: number;
    dialoguePacingScore: number;
    hasDialogueConflict: boolean;

    documentFormat: DocumentFormat;
    plotAnalysis?: PlotAnalysis;

    analyzedCharacters: string[];
    decisionBeliefLoops: DecisionBeliefLoop[];
    characterInteractions: CharacterInteraction[];
    characterPresence: CharacterPresence[];
    beliefShiftMatrices: BeliefShiftMatrix[];
    decisionConsequenceChains: DecisionConsequenceChain[];
    relationshipEvolutionData: RelationshipEvolutionData;
    internalExternalAlignment: InternalExternalAlignmentData[];
    languageDriftData: LanguageDriftData[];

    poetryInsights?: PoetryInsights;

    truncated: boolean;
    warnings: AnalysisWarning[];
}
