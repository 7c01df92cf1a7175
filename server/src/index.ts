/**
 * index.ts — Manuscript Lens API Server
 *
 * Express server around the analysis engine with Redis result caching
 * and rate limiting.
 *
 * Run: npx tsx server/src/index.ts
 */

import type { Server } from 'node:http';
import { createApp } from './app.js';
import { config } from './config.js';
import { disconnect as disconnectRedis, getClient as getRedis } from './services/redis.js';

let server: Server | null = null;

async function start(): Promise<void> {
    // Redis is optional: cache and rate limiter pass through without it
    try {
        await getRedis();
        console.log('[Server] Redis connected');
    } catch (err) {
        console.warn(
            '[Server] Redis unavailable, running in degraded mode:',
            err instanceof Error ? err.message : String(err),
        );
    }

    server = createApp().listen(config.port, () => {
        console.log(`[ManuscriptLens API] listening on http://localhost:${config.port}`);
        console.log(`[ManuscriptLens API] health: http://localhost:${config.port}/health`);
        console.log(`[ManuscriptLens API] allowed origins: ${config.allowedOrigins.join(', ')}`);
    });
}

// ── Graceful shutdown ────────────────────────────────────────

function closeServer(): Promise<void> {
    return new Promise((resolve, reject) => {
        if (!server) {
            resolve();
            return;
        }
        server.close(err => (err ? reject(err) : resolve()));
    });
}

async function shutdown(signal: string): Promise<void> {
    console.log(`\n[Server] ${signal} received, shutting down...`);

    const timeout = setTimeout(() => {
        console.error('[Server] Shutdown timeout, forcing exit');
        process.exit(1);
    }, 30_000);

    try {
        await closeServer();
        await disconnectRedis();
    } catch (err) {
        console.error('[Server] Error during shutdown:', err instanceof Error ? err.message : String(err));
    }

    clearTimeout(timeout);
    process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

start().catch(err => {
    console.error('[Server] Fatal startup error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
