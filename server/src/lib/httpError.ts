/**
 * httpError.ts — HTTP-aware errors and categorisation for the error handler
 */

export type ErrorCategory = 'validation' | 'rate_limit' | 'timeout' | 'network' | 'server' | 'unknown';

/** An error whose message is safe to return to the client */
export class HttpError extends Error {
    readonly status: number;

    constructor(status: number, message: string) {
        super(message);
        this.name = 'HttpError';
        this.status = status;
    }
}

/** Status carried by the error itself (HttpError, body-parser errors) */
export function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

export function categorizeError(error: unknown): ErrorCategory {
    const status = statusOf(error);
    if (status !== undefined) {
        if (status === 429) return 'rate_limit';
        if (status === 408 || status === 504) return 'timeout';
        if (status >= 400 && status < 500) return 'validation';
        if (status >= 500) return 'server';
    }

    if (error instanceof Error) {
        const message = error.message.toLowerCase();
        const name = error.name.toLowerCase();

        if (
            message.includes('network') ||
            message.includes('connection') ||
            message.includes('econnrefused') ||
            message.includes('dns')
        ) {
            return 'network';
        }

        if (name === 'timeouterror' || message.includes('timeout') || message.includes('timed out')) {
            return 'timeout';
        }

        if (message.includes('rate limit') || message.includes('too many requests')) {
            return 'rate_limit';
        }

        if (message.includes('invalid') || message.includes('validation')) {
            return 'validation';
        }
    }

    return 'unknown';
}

const CATEGORY_STATUS: Record<ErrorCategory, number> = {
    validation: 400,
    rate_limit: 429,
    timeout: 504,
    network: 502,
    server: 500,
    unknown: 500,
};

export function statusForError(error: unknown): number {
    return statusOf(error) ?? CATEGORY_STATUS[categorizeError(error)];
}
