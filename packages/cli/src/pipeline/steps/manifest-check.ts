import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { getOutputsPath } from '../../workspace/paths.js';
import { MANIFEST_FILENAME, readManifest } from '../../workspace/manifests.js';
import { errorMessage } from '../../utils/errors.js';
import { OUTPUT_FILES } from './export.js';

/**
 * Step 1: Manifest Check
 * Prevents accidental overwrite of a processed month unless --force is used.
 * Any output file counts, not just the manifest. With --force the previous
 * run is named in a warning before its outputs are replaced.
 */
export const manifestCheck: PipelineStep = async (state) => {
    // A dry run writes nothing, so there is nothing to protect.
    if (state.options.dryRun) {
        return state;
    }

    const outputPath = getOutputsPath(state.workspace, state.month);
    const existingFiles = Object.values(OUTPUT_FILES).filter(f => existsSync(join(outputPath, f)));
    if (existingFiles.length === 0) {
        return state;
    }

    if (!state.options.force) {
        state.errors.push({
            step: 'manifest-check',
            message: `Output for ${state.month} already exists (found: ${existingFiles.join(', ')}). Use --force to overwrite.`,
            fatal: true
        });
        return state;
    }

    try {
        const previous = await readManifest(join(outputPath, MANIFEST_FILENAME));
        if (previous) {
            state.warnings.push(
                `Overwriting ${state.month} outputs from the run of ${previous.run_timestamp} (${previous.transaction_count} transactions).`
            );
        }
    } catch (err) {
        state.warnings.push(`Overwriting ${state.month} outputs; previous manifest unreadable: ${errorMessage(err)}`);
    }

    return state;
};
