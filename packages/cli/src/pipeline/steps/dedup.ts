import { dedupeRows, generateRowKey } from '@cash-recon/core';
import type { TransactionDetailRow, TransactionRow } from '@cash-recon/shared';
import type { PipelineStep } from '../types.js';
import { loadProcessedRowKeys } from '../../workspace/manifests.js';
import { errorMessage } from '../../utils/errors.js';

interface KeyedRow {
    key: string;
    row: TransactionRow;
    detail: TransactionDetailRow;
}

/**
 * Step 4: Deduplication
 * Drops transactions repeated across files (overlapping bank reports) and
 * transactions already processed in another month's run. Repeats within
 * one file are kept. Balance rows are
 * point-in-time snapshots and are kept as-is.
 */
export const deduplicateRows: PipelineStep = async (state) => {
    let processed: Set<string>;
    try {
        const loaded = await loadProcessedRowKeys(state.workspace, state.month);
        processed = loaded.keys;
        state.warnings.push(...loaded.warnings);
    } catch (err) {
        state.errors.push({
            step: 'dedup',
            message: `Failed to read previous run manifests: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }

    // Files are processed in filename order (sorted in Step 2). Each file is
    // checked against earlier runs and earlier files, never against itself.
    const seen = new Set(processed);
    const kept: KeyedRow[] = [];
    let removedTotal = 0;
    let previouslyProcessed = 0;

    for (const file of state.files) {
        const result = state.parseResults[file.filename];
        if (!result) continue;

        state.balanceRows.push(...result.balanceRows);
        const keyed: KeyedRow[] = result.transactionRows.map((row, i) => ({
            key: generateRowKey(row),
            row,
            detail: result.detailRows[i],
        }));

        const { rows, keys, removed } = dedupeRows(keyed, k => k.key, seen);
        previouslyProcessed += keyed.filter(k => processed.has(k.key)).length;
        removedTotal += removed;
        kept.push(...rows);
        for (const key of keys) seen.add(key);
    }

    state.transactionRows = kept.map(k => k.row);
    state.detailRows = kept.map(k => k.detail);
    state.rowKeys = kept.map(k => k.key);
    state.statistics.previouslyProcessedCount = previouslyProcessed;
    state.statistics.duplicateCount = removedTotal - previouslyProcessed;

    if (state.statistics.duplicateCount > 0) {
        state.warnings.push(`${state.statistics.duplicateCount} duplicate transactions removed across files.`);
    }
    if (previouslyProcessed > 0) {
        state.warnings.push(`${previouslyProcessed} transactions already processed in an earlier run were skipped.`);
    }

    return state;
};
