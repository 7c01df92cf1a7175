/**
 * routes/health.ts — Health check with Redis status and engine timings
 */

import { Router } from 'express';
import { formatBytes, getMemoryInfo, summarizeStages } from '../../../src/index.js';
import { asyncHandler } from '../lib/asyncHandler.js';
import { isHealthy as redisHealthy } from '../services/redis.js';
import type { HealthResponse } from '../types.js';

const router = Router();

router.get(
    '/health',
    asyncHandler(async (_req, res) => {
        const redis = await redisHealthy();
        const memory = getMemoryInfo();

        const body: HealthResponse = {
            status: redis.connected ? 'ok' : 'degraded',
            uptime: Math.round(process.uptime()),
            redis,
            engine: { stages: summarizeStages().slice(0, 10) },
            memory: {
                heapUsed: formatBytes(memory.heapUsed),
                usagePercent: parseFloat(memory.usagePercent.toFixed(1)),
            },
        };
        res.json(body);
    }),
);

export default router;
