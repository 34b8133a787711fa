import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MATCHING_CONFIG, type RunManifest } from '@cash-recon/shared';
import type { PipelineState, PipelineStep } from '../types.js';
import { getOutputsPath } from '../../workspace/paths.js';
import { MANIFEST_FILENAME } from '../../workspace/manifests.js';
import { rowsToCsv } from '../../export/csv.js';
import { BALANCE_COLUMNS, DETAIL_COLUMNS, TRANSACTION_COLUMNS } from '../../export/columns.js';
import { generateCashApplicationExcel } from '../../excel/cash-application.js';
import { errorMessage } from '../../utils/errors.js';

export const MANIFEST_VERSION = '1.0.0';

export const OUTPUT_FILES = {
    balances: 'balances.csv',
    transactions: 'transactions.csv',
    details: 'transaction_details.csv',
    cashApplication: 'cash_application.xlsx',
    manifest: MANIFEST_FILENAME,
} as const;

/**
 * Manifest for this run. Row keys let later runs skip these transactions.
 */
export function buildManifest(state: PipelineState, runTimestamp: string): RunManifest {
    const matchedRows = state.matchResult?.rows ?? [];
    return {
        month: state.month,
        run_timestamp: runTimestamp,
        input_files: Object.fromEntries(state.files.map(f => [f.filename, f.hash])),
        transaction_count: state.transactionRows.length,
        row_keys: state.rowKeys,
        matched_row_keys: state.rowKeys.filter((_, i) => Boolean(matchedRows[i]?.invoice_number)),
        version: MANIFEST_VERSION,
    };
}

/**
 * Step 8: Export
 * Writes the CSV exports, the cash application workbook and the manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const outputPath = getOutputsPath(state.workspace, state.month);

    try {
        await mkdir(outputPath, { recursive: true });

        // 1. CSV exports
        await writeFile(join(outputPath, OUTPUT_FILES.balances), rowsToCsv(state.balanceRows, BALANCE_COLUMNS));
        await writeFile(join(outputPath, OUTPUT_FILES.transactions), rowsToCsv(state.transactionRows, TRANSACTION_COLUMNS));
        await writeFile(join(outputPath, OUTPUT_FILES.details), rowsToCsv(state.detailRows, DETAIL_COLUMNS));

        // 2. Cash application workbook
        const workbook = await generateCashApplicationExcel(
            state.matchResult?.rows ?? [],
            state.balanceRows,
            state.config.matching.linkLabel ?? MATCHING_CONFIG.LINK_LABEL
        );
        await workbook.xlsx.writeFile(join(outputPath, OUTPUT_FILES.cashApplication));

        // 3. Run manifest
        const manifest = buildManifest(state, new Date().toISOString());
        await writeFile(join(outputPath, OUTPUT_FILES.manifest), JSON.stringify(manifest, null, 2));
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
