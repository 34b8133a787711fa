import type { ReconConfig } from '@cash-recon/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { manifestCheck } from './steps/manifest-check.js';
import { detectFiles } from './steps/detect.js';
import { parseFiles } from './steps/parse.js';
import { deduplicateRows } from './steps/dedup.js';
import { loadInvoiceList } from './steps/invoices.js';
import { matchTransactions } from './steps/match.js';
import { validateFinal } from './steps/validate.js';
import { exportResults } from './steps/export.js';
import { archiveRawFiles } from './steps/archive.js';
import type { Workspace, ProcessOptions } from '../types.js';
import { error } from '../utils/console.js';

export const PIPELINE_STEPS: readonly { name: string; fn: PipelineStep }[] = [
    { name: 'Manifest Check', fn: manifestCheck },
    { name: 'File Detection', fn: detectFiles },
    { name: 'Parsing', fn: parseFiles },
    { name: 'Deduplication', fn: deduplicateRows },
    { name: 'Invoice Loading', fn: loadInvoiceList },
    { name: 'Invoice Matching', fn: matchTransactions },
    { name: 'Final Validation', fn: validateFinal },
    { name: 'Export Results', fn: exportResults },
    { name: 'Archiving', fn: archiveRawFiles },
];

export function createInitialState(
    month: string,
    workspace: Workspace,
    config: ReconConfig,
    options: ProcessOptions
): PipelineState {
    return {
        month,
        workspace,
        config,
        options,
        files: [],
        parseResults: {},
        balanceRows: [],
        transactionRows: [],
        detailRows: [],
        rowKeys: [],
        invoices: [],
        warnings: [],
        errors: [],
        statistics: {
            rawTransactionCount: 0,
            duplicateCount: 0,
            previouslyProcessedCount: 0,
        },
    };
}

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    month: string,
    workspace: Workspace,
    config: ReconConfig,
    options: ProcessOptions
): Promise<PipelineState> {
    let state = createInitialState(month, workspace, config, options);

    for (const [i, step] of PIPELINE_STEPS.entries()) {
        console.log(`\n→ Step ${i + 1}/${PIPELINE_STEPS.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
