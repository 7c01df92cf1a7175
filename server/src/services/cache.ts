/**
 * cache.ts — Redis-based analysis result caching
 *
 * Stores serialised AnalysisResults under a SHA-256 key of the normalised
 * request. TTL defaults to 30 minutes (configurable via CACHE_TTL_SECONDS).
 */

import { trackAsync } from '../../../src/index.js';
import { config } from '../config.js';
import { contentHash } from '../lib/hash.js';
import type { AnalyzeRequest } from '../types.js';
import { getClient } from './redis.js';

const PREFIX = `${config.redisKeyPrefix}analysis:`;

export function analysisCacheKey(request: AnalyzeRequest): string {
    return PREFIX + contentHash('analyze', JSON.stringify(request));
}

/** Returns null on miss or if Redis is down. */
export async function getCachedAnalysis(key: string): Promise<string | null> {
    try {
        return await trackAsync('cache.read', async () => {
            const redis = await getClient();
            return redis.get(key);
        });
    } catch (err) {
        console.warn('[Cache] Read failed, skipping cache:', err instanceof Error ? err.message : String(err));
        return null;
    }
}

/** Never throws; a failed write only means the next request recomputes. */
export async function setCachedAnalysis(key: string, payload: string): Promise<void> {
    try {
        await trackAsync('cache.write', async () => {
            const redis = await getClient();
            await redis.set(key, payload, 'EX', config.cacheTtlSeconds);
        });
    } catch (err) {
        console.warn('[Cache] Write failed, result not cached:', err instanceof Error ? err.message : String(err));
    }
}
