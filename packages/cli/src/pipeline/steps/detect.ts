import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { isBai2Filename, looksLikeBai2 } from '@cash-recon/core';
import type { PipelineStep, InputFile } from '../types.js';
import { getImportsPath } from '../../workspace/paths.js';
import { contentHash } from '../../utils/hash.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 2: File Detection
 * Lists files in the imports directory, keeps the BAI2 ones and hashes them.
 */
export const detectFiles: PipelineStep = async (state) => {
    const importsPath = getImportsPath(state.workspace, state.month);

    try {
        const entries = (await readdir(importsPath)).sort();
        const files: InputFile[] = [];

        for (const filename of entries) {
            const filePath = join(importsPath, filename);
            const s = await stat(filePath);

            if (!s.isFile()) {
                continue;
            }

            if (!isBai2Filename(filename)) {
                if (!filename.startsWith('.') && !filename.startsWith('~')) {
                    state.warnings.push(`File skipped (not a BAI2 file): ${filename}`);
                }
                continue;
            }

            const raw = await readFile(filePath);
            if (!looksLikeBai2(raw.toString('utf-8'))) {
                state.warnings.push(`File skipped (no BAI2 file header): ${filename}`);
                continue;
            }

            files.push({
                path: filePath,
                filename,
                hash: contentHash(raw),
            });
        }

        state.files = files;

        if (files.length === 0) {
            state.errors.push({
                step: 'detect',
                message: `No BAI2 files found in ${importsPath}. Expected *.bai, *.bai2 or *.txt starting with a 01 record.`,
                fatal: true
            });
        }
    } catch (err) {
        state.errors.push({
            step: 'detect',
            message: `Error scanning directory ${importsPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
