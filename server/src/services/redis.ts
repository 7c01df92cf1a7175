/**
 * redis.ts — Redis client singleton
 *
 * Uses ioredis with automatic reconnection. Commands fail fast while the
 * connection is down so callers can degrade instead of queueing.
 */

import { Redis } from 'ioredis';
import { config } from '../config.js';

let client: Redis | null = null;

function createClient(label: string): Redis {
    const redis = new Redis(config.redisUrl, {
        maxRetriesPerRequest: 3,
        enableOfflineQueue: false,
        retryStrategy(times: number) {
            const delay = Math.min(times * 500, 5000);
            console.log(`[Redis:${label}] Reconnecting in ${delay}ms (attempt ${times})`);
            return delay;
        },
        lazyConnect: true,
    });

    redis.on('connect', () => console.log(`[Redis:${label}] Connected`));
    redis.on('error', (err: Error) => console.error(`[Redis:${label}] Error:`, err.message));
    redis.on('close', () => console.log(`[Redis:${label}] Connection closed`));

    return redis;
}

/** Get the shared client (creates and connects on first call). */
export async function getClient(): Promise<Redis> {
    if (!client) {
        const fresh = createClient('main');
        try {
            await fresh.connect();
        } catch (err) {
            fresh.disconnect();
            throw err;
        }
        client = fresh;
    }
    return client;
}

/** Check if Redis is reachable. Latency is -1 when it is not. */
export async function isHealthy(): Promise<{ connected: boolean; latencyMs: number }> {
    try {
        const c = await getClient();
        const start = Date.now();
        await c.ping();
        return { connected: true, latencyMs: Date.now() - start };
    } catch {
        return { connected: false, latencyMs: -1 };
    }
}

export async function disconnect(): Promise<void> {
    if (client) {
        await client.quit();
        client = null;
    }
    console.log('[Redis] Disconnected');
}
