import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RunManifestSchema, type RunManifest } from '@cash-recon/shared';
import type { Workspace } from '../types.js';
import { errorCode, errorMessage } from '../utils/errors.js';

export const MANIFEST_FILENAME = 'run_manifest.json';

const MONTH_DIR = /^\d{4}-\d{2}$/;

export interface ProcessedKeys {
    keys: Set<string>;
    warnings: string[];
}

/**
 * Reads and validates a run manifest; null when the file does not exist.
 */
export async function readManifest(path: string): Promise<RunManifest | null> {
    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (err) {
        if (errorCode(err) === 'ENOENT') return null;
        throw err;
    }
    return RunManifestSchema.parse(JSON.parse(content));
}

/**
 * Row keys recorded by the manifests of every other processed month.
 * Unreadable manifests are reported and skipped.
 */
export async function loadProcessedRowKeys(workspace: Workspace, excludeMonth: string): Promise<ProcessedKeys> {
    const keys = new Set<string>();
    const warnings: string[] = [];

    let entries: string[];
    try {
        entries = await readdir(workspace.outputs);
    } catch (err) {
        if (errorCode(err) === 'ENOENT') {
            return { keys, warnings };
        }
        throw err;
    }

    for (const month of entries.filter(e => MONTH_DIR.test(e) && e !== excludeMonth).sort()) {
        try {
            const manifest = await readManifest(join(workspace.outputs, month, MANIFEST_FILENAME));
            for (const key of manifest?.row_keys ?? []) {
                keys.add(key);
            }
        } catch (err) {
            warnings.push(`Ignoring unreadable manifest for ${month}: ${errorMessage(err)}`);
        }
    }

    return { keys, warnings };
}
