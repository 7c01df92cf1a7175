/**
 * hash.ts — Content hashing for cache keys
 */

import { createHash } from 'node:crypto';

/** SHA-256 hex digest of the parts joined with ':' */
export function contentHash(...parts: string[]): string {
    return createHash('sha256').update(parts.join(':')).digest('hex');
}
