/**
 * asyncHandler.ts — Forwards rejected route promises to the Express error handler
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

export function asyncHandler(
    handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
    return (req, res, next) => {
        handler(req, res, next).catch(next);
    };
}
