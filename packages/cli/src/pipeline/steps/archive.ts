import { mkdir, copyFile, rename, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { getArchivePath } from '../../workspace/paths.js';
import { errorCode, errorMessage } from '../../utils/errors.js';

/**
 * Moves a file, copying then deleting when source and target are on
 * different devices.
 */
export async function moveFile(from: string, to: string): Promise<void> {
    try {
        await rename(from, to);
    } catch (err) {
        if (errorCode(err) !== 'EXDEV') {
            throw err;
        }
        await copyFile(from, to);
        await unlink(from);
    }
}

/**
 * Step 9: Archiving
 * Moves processed raw files to the archive so the next run starts clean.
 * Files are moved, not copied.
 */
export const archiveRawFiles: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping archival.');
        return state;
    }

    if (state.errors.some(e => e.fatal)) {
        state.warnings.push('Archival skipped due to previous fatal errors.');
        return state;
    }

    const archivePath = getArchivePath(state.workspace, state.month);

    try {
        await mkdir(archivePath, { recursive: true });

        for (const file of state.files) {
            // Files that failed to parse stay in imports for another attempt.
            if (!state.parseResults[file.filename]) {
                state.warnings.push(`Not archived (failed to parse): ${file.filename}`);
                continue;
            }
            await moveFile(file.path, join(archivePath, file.filename));
        }
    } catch (err) {
        state.errors.push({
            step: 'archive',
            message: `Failed to archive files to ${archivePath}: ${errorMessage(err)}`,
            // Outputs are already written and remain valid.
            fatal: false,
            error: err
        });
    }

    return state;
};
