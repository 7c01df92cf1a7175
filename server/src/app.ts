/**
 * app.ts — Express application wiring
 *
 * Kept separate from index.ts so tests can mount the app on an ephemeral port.
 */

import express, { type Express } from 'express';
import { config } from './config.js';
import { HttpError } from './lib/httpError.js';
import { corsMiddleware } from './middleware/cors.js';
import { errorHandler } from './middleware/errorHandler.js';
import { rateLimitMiddleware } from './middleware/rateLimit.js';
import analyzeRoutes from './routes/analyze.js';
import healthRoutes from './routes/health.js';

export function createApp(): Express {
    const app = express();
    app.disable('x-powered-by');

    // ── Middleware ────────────────────────────────────────────
    app.use(corsMiddleware);
    app.use(express.json({ limit: config.maxBodyBytes }));
    app.use('/api/analyze', rateLimitMiddleware);

    // ── Routes ───────────────────────────────────────────────
    app.use(healthRoutes);
    app.use(analyzeRoutes);
    app.use((_req, _res, next) => next(new HttpError(404, 'Not found')));

    // ── Error handler (must be last) ─────────────────────────
    app.use(errorHandler);

    return app;
}
