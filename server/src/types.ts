/**
 * types.ts — Shared server-side type definitions
 */

import type {
    AnalysisStyle,
    CharacterSnapshot,
    OutlineEntry,
    PageMappingEntry,
    StageTiming,
} from '../../src/index.js';

// ─── Analyze Endpoint ────────────────────────────────────────

export interface AnalyzeRequest {
    text: string;
    style: AnalysisStyle;
    outline?: OutlineEntry[];
    pageMapping?: PageMappingEntry[];
    pageCountOverride?: number;
    characters?: CharacterSnapshot['characters'];
    characterNames?: string[];
}

// ─── Health Endpoint ─────────────────────────────────────────

export interface HealthResponse {
    status: 'ok' | 'degraded';
    uptime: number;
    redis: { connected: boolean; latencyMs: number };
    engine: { stages: StageTiming[] };
    memory: { heapUsed: string; usagePercent: number };
}
