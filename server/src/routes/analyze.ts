/**
 * routes/analyze.ts — Manuscript analysis with Redis result caching
 */

import { Router } from 'express';
import { analyze, createCharacterRegistry, type AnalysisOptions } from '../../../src/index.js';
import { config } from '../config.js';
import { asyncHandler } from '../lib/asyncHandler.js';
import { parseAnalyzeRequest } from '../lib/requestParser.js';
import { analysisCacheKey, getCachedAnalysis, setCachedAnalysis } from '../services/cache.js';
import type { AnalyzeRequest } from '../types.js';

const router = Router();

export function toAnalysisOptions(request: AnalyzeRequest): AnalysisOptions {
    return {
        style: request.style,
        outline: request.outline,
        pageMapping: request.pageMapping,
        pageCountOverride: request.pageCountOverride,
        characterRegistry: request.characters
            ? createCharacterRegistry({ characters: request.characters })
            : undefined,
        characterNames: request.characterNames,
        maxAnalysisLength: config.maxAnalysisLength,
    };
}

function isJson(payload: string): boolean {
    try {
        JSON.parse(payload);
        return true;
    } catch (err) {
        console.warn('[Cache] Discarding corrupt entry:', err instanceof Error ? err.message : String(err));
        return false;
    }
}

router.post(
    '/api/analyze',
    asyncHandler(async (req, res) => {
        const request = parseAnalyzeRequest(req.body);
        const key = analysisCacheKey(request);

        const cached = await getCachedAnalysis(key);
        if (cached !== null && isJson(cached)) {
            res.set('X-Cache', 'HIT').type('application/json').send(cached);
            return;
        }

        const payload = JSON.stringify(analyze(request.text, toAnalysisOptions(request)));
        await setCachedAnalysis(key, payload);

        res.set('X-Cache', 'MISS').type('application/json').send(payload);
    }),
);

export default router;
