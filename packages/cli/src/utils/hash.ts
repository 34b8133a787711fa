import { createHash } from 'node:crypto';

/**
 * Content fingerprint recorded in the run manifest, as `sha256:<hex>`.
 * Hashes the raw bytes so the value does not depend on text decoding.
 */
export function contentHash(content: Buffer | string): string {
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}
