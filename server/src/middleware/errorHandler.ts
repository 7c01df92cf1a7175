/**
 * errorHandler.ts — Centralized Express error handling middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { HttpError, statusForError } from '../lib/httpError.js';

// Express requires 4-parameter signature for error handlers
export function errorHandler(
    err: unknown,
    _req: Request,
    res: Response,
    _next: NextFunction,
): void {
    const message = err instanceof Error ? err.message : String(err);

    if (message.includes('not allowed by CORS')) {
        console.warn('[Server] Rejected origin:', message);
        res.status(403).json({ error: 'Not allowed by CORS' });
        return;
    }

    const status = statusForError(err);
    if (status >= 500) {
        console.error('[Server] Unhandled error:', message);
        res.status(status).json({ error: 'Internal server error' });
        return;
    }

    if (status === 413) {
        res.status(413).json({ error: 'Request body too large' });
        return;
    }
    res.status(status).json({ error: err instanceof HttpError ? err.message : `Bad request: ${message}` });
}
