import { readFile } from 'node:fs/promises';
import {
    parseBai2,
    toBalanceRows,
    toTransactionDetailRows,
    toTransactionRows,
} from '@cash-recon/core';
import type { PipelineStep } from '../types.js';
import { promptContinue } from '../../utils/prompt.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 3: Parsing
 * Reads each detected file and decodes it into balance, transaction and
 * detail rows.
 */
export const parseFiles: PipelineStep = async (state) => {
    const rowOptions = {
        accountTitle: state.config.account_title,
        entity: state.config.entity,
    };

    for (const file of state.files) {
        try {
            const content = await readFile(file.path, 'utf-8');
            const result = parseBai2(content);

            state.parseResults[file.filename] = {
                balanceRows: toBalanceRows(result.file),
                transactionRows: toTransactionRows(result.file, rowOptions),
                detailRows: toTransactionDetailRows(result.file),
                skippedLines: result.skippedLines,
            };

            for (const warning of result.warnings) {
                state.warnings.push(`[${file.filename}] ${warning}`);
            }
        } catch (err) {
            state.errors.push({
                step: 'parse',
                message: `Failed to parse ${file.filename}: ${errorMessage(err)}`,
                fatal: false,
                error: err
            });
        }
    }

    state.statistics.rawTransactionCount = Object.values(state.parseResults).reduce(
        (acc, res) => acc + res.transactionRows.length,
        0
    );

    const parseErrors = state.errors.filter(e => e.step === 'parse');
    if (parseErrors.length > 0) {
        const shouldContinue = await promptContinue(
            `\n⚠️  ${parseErrors.length} file(s) failed to parse. Some data will be missing.`,
            state.options
        );

        if (!shouldContinue) {
            state.errors.push({
                step: 'parse',
                message: 'Aborted by user after parse errors.',
                fatal: true
            });
        }
    }

    return state;
};
