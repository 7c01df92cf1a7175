/**
 * rateLimit.ts — Cost-weighted fixed window limiter for /api/analyze
 *
 * Each request spends one unit plus one per RATE_UNIT_CHARS of submitted
 * text, counted per IP in a Redis key that expires with the window.
 * Requests pass through when Redis is unavailable.
 */

import { config } from '../config.js';
import { asyncHandler } from '../lib/asyncHandler.js';
import { getClient } from '../services/redis.js';

const PREFIX = `${config.redisKeyPrefix}rl:`;

/** One unit per request plus one per full `rateUnitChars` of text */
export function requestCost(body: unknown): number {
    const text = typeof body === 'object' && body !== null && 'text' in body ? body.text : undefined;
    const length = typeof text === 'string' ? text.length : 0;
    return 1 + Math.floor(length / config.rateUnitChars);
}

/** Whole seconds until the window resets; the full window when Redis reports no TTL */
export function retryAfterSeconds(pttlMs: number): number {
    const ms = pttlMs > 0 ? pttlMs : config.rateWindowMs;
    return Math.ceil(ms / 1000);
}

export const rateLimitMiddleware = asyncHandler(async (req, res, next) => {
    const key = PREFIX + (req.ip ?? 'unknown');
    const cost = requestCost(req.body);

    try {
        const redis = await getClient();
        const spent = await redis.incrby(key, cost);
        // First spend in this window starts the clock
        if (spent === cost) await redis.pexpire(key, config.rateWindowMs);

        if (spent > config.rateMaxUnits) {
            const pttl = await redis.pttl(key);
            res.set('Retry-After', String(retryAfterSeconds(pttl)));
            res.status(429).json({ error: 'Rate limit exceeded. Try again shortly.' });
            return;
        }
    } catch (err) {
        console.warn(
            '[RateLimit] Redis unavailable, allowing request:',
            err instanceof Error ? err.message : String(err),
        );
    }

    next();
});
