/**
 * config.ts — Centralized server configuration from environment variables
 */

export function parsePositiveInt(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const n = Number(value);
    if (!Number.isFinite(n) || n < 1) return fallback;
    return Math.floor(n);
}

export function parseOrigins(value: string | undefined, fallback: string): string[] {
    return (value || fallback)
        .split(',')
        .map(o => o.trim())
        .filter(Boolean);
}

export const config = {
    // Server
    port: parsePositiveInt(process.env.PORT, 3001),
    nodeEnv: process.env.NODE_ENV || 'development',
    maxBodyBytes: parsePositiveInt(process.env.MAX_BODY_BYTES, 2 * 1024 * 1024),

    // CORS
    allowedOrigins: parseOrigins(process.env.ALLOWED_ORIGINS, 'http://localhost:5173'),

    // Redis
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    redisKeyPrefix: process.env.REDIS_KEY_PREFIX || 'mlens:',
    cacheTtlSeconds: parsePositiveInt(process.env.CACHE_TTL_SECONDS, 1800),

    // Rate limiting
    rateWindowMs: parsePositiveInt(process.env.RATE_WINDOW_MS, 60_000),
    rateMaxUnits: parsePositiveInt(process.env.RATE_MAX_UNITS, 200),
    rateUnitChars: parsePositiveInt(process.env.RATE_UNIT_CHARS, 10_000),

    // Engine
    maxAnalysisLength: parsePositiveInt(process.env.MAX_ANALYSIS_LENGTH, 500_000),
} as const;

export type Config = typeof config;
