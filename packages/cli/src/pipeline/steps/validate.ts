import type { PipelineStep } from '../types.js';
import { log } from '../../utils/console.js';

/**
 * Step 7: Final Validation
 * Reconciles row counts across the run and reports the matching summary.
 */
export const validateFinal: PipelineStep = async (state) => {
    const { rawTransactionCount: n, duplicateCount: d, previouslyProcessedCount: p } = state.statistics;
    const current = state.transactionRows.length;
    const expected = n - d - p;

    log(`\n--- Transaction Reconciliation ---`);
    log(`Raw Input:          ${n}`);
    log(`Duplicates:         ${d}`);
    log(`Already Processed:  ${p}`);
    log(`Unique Current:     ${current}`);
    log(`Balance Rows:       ${state.balanceRows.length}`);

    if (current !== expected) {
        state.warnings.push(`Reconciliation discrepancy: Expected ${expected} unique transactions, but found ${current}.`);
    }

    if (state.matchResult) {
        const { stats } = state.matchResult;
        log(`Credit Rows:        ${stats.credit_rows}`);
        log(`Matched:            ${stats.matched}`);
        log(`Below Threshold:    ${stats.below_threshold}`);

        if (state.matchResult.rows.length !== current) {
            state.errors.push({
                step: 'validate',
                message: `Matcher returned ${state.matchResult.rows.length} rows for ${current} transactions.`,
                fatal: true
            });
        }
    }

    if (current === 0 && state.balanceRows.length === 0 && state.errors.length === 0) {
        state.errors.push({
            step: 'validate',
            message: 'No transactions or balances were decoded. Are the input files empty?',
            fatal: true
        });
    } else if (current === 0) {
        state.warnings.push('No new transactions in this run.');
    }

    return state;
};
