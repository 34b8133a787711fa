import type { ReconConfig, RunLogEntry } from '@cash-recon/shared';
import { CONFIG_RELATIVE_PATH, WORKSPACE_ENV, detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadConfig } from '../workspace/config.js';
import { appendRunLog } from '../workspace/run-log.js';
import { runPipeline } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import { log, success, warn, info, arrow, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import type { ProcessOptions } from '../types.js';

/**
 * Validates a YYYY-MM month argument.
 *
 * @returns Error message, or null when valid
 */
export function validateMonth(month: string): string | null {
    const monthMatch = month.match(/^(\d{4})-(\d{2})$/);
    if (!monthMatch) {
        return 'Invalid month format. Use YYYY-MM (e.g., 2026-01).';
    }
    const m = parseInt(monthMatch[2], 10);
    if (m < 1 || m > 12) {
        return `Invalid month "${monthMatch[2]}". Must be between 01 and 12.`;
    }
    return null;
}

/**
 * Run log entry summarising a finished pipeline.
 */
export function buildRunLogEntry(state: PipelineState, startedAt: string, finishedAt: string): RunLogEntry {
    const fatal = state.errors.filter(e => e.fatal);
    return {
        started_at: startedAt,
        finished_at: finishedAt,
        status: fatal.length > 0 ? 'error' : 'success',
        month: state.month,
        input_files: state.files.map(f => f.filename),
        balance_rows: state.balanceRows.length,
        transaction_rows: state.transactionRows.length,
        invoices_loaded: state.invoices.length,
        matches_found: state.matchResult?.stats.matched ?? 0,
        error: fatal.length > 0 ? fatal.map(e => e.message).join('; ') : null,
    };
}

/**
 * `process <YYYY-MM>`: run the full pipeline for one month.
 *
 * @returns Process exit code
 */
export async function processMonth(month: string, options: ProcessOptions): Promise<number> {
    log(`\nCash Recon - Processing ${month}`);

    const monthError = validateMonth(month);
    if (monthError) {
        error(`Error: ${monthError}`);
        return 1;
    }

    arrow('Detecting workspace...');
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        error('Error: Workspace not found.', `Expected "${CONFIG_RELATIVE_PATH}" in the workspace root or set ${WORKSPACE_ENV}.`);
        return 1;
    }
    const workspace = resolveWorkspace(root);
    success(`Workspace: ${workspace.root}`);

    let config: ReconConfig;
    try {
        config = loadConfig(workspace);
    } catch (err) {
        error(`Error: Failed to load configuration. ${errorMessage(err)}`);
        return 1;
    }

    const startedAt = new Date().toISOString();
    const state = await runPipeline(month, workspace, config, options);

    if (!options.dryRun) {
        try {
            await appendRunLog(workspace.runLogPath, buildRunLogEntry(state, startedAt, new Date().toISOString()));
        } catch (err) {
            state.warnings.push(`Run log not updated: ${errorMessage(err)}`);
        }
    }

    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Processing failed with fatal errors.');
            return 1;
        }
    }

    success(`Processing complete for ${month}.`);
    arrow(`Balances: ${state.balanceRows.length}`);
    arrow(`Transactions: ${state.transactionRows.length}`);
    if (state.matchResult) {
        arrow(`Matched to invoices: ${state.matchResult.stats.matched} of ${state.matchResult.stats.credit_rows} credits`);
    }

    if (!options.dryRun) {
        arrow(`Outputs saved to: ${workspace.outputs}/${month}`);
    } else {
        info('Dry run: no files were written or archived.');
    }

    return 0;
}
