/**
 * index.ts — Public API of the manuscript analysis engine
 */

export { analyze, analyzeText } from './lib/analysisEngine';
export { ANALYSIS_CONFIG, type AnalysisConfig } from './lib/config';
export { createCharacterRegistry, resolveAnalysisCharacters, extractCandidateNames } from './lib/characterRegistry';
export { rankSignificantCharacters } from './lib/characterAnalytics';
export { defaultFormatDetector, detectFormat } from './lib/formatDetector';
export { LexiconError } from './lib/lexicons';
export {
    getPerformanceReport,
    summarizeStages,
    trackAsync,
    getMemoryInfo,
    formatBytes,
    formatDuration,
    type StageTiming,
} from './lib/performance';
export type * from './types/analysis';
