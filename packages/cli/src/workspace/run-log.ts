import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { RUN_LOG, RunLogSchema, type RunLogEntry } from '@cash-recon/shared';
import { errorCode } from '../utils/errors.js';

/**
 * Reads the run log. A missing file is an empty log.
 */
export async function readRunLog(path: string): Promise<RunLogEntry[]> {
    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (err) {
        if (errorCode(err) === 'ENOENT') return [];
        throw err;
    }
    return RunLogSchema.parse(JSON.parse(content));
}

/**
 * Prepends an entry and keeps the newest RUN_LOG.MAX_ENTRIES.
 *
 * @returns The log as written
 */
export async function appendRunLog(path: string, entry: RunLogEntry): Promise<RunLogEntry[]> {
    const existing = await readRunLog(path);
    const entries = [entry, ...existing].slice(0, RUN_LOG.MAX_ENTRIES);

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(entries, null, 2));

    return entries;
}
