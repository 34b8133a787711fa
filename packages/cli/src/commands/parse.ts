import { readFile } from 'node:fs/promises';
import {
    parseBai2,
    toBalanceRows,
    toTransactionDetailRows,
    toTransactionRows,
} from '@cash-recon/core';
import { rowsToCsv } from '../export/csv.js';
import { BALANCE_COLUMNS, DETAIL_COLUMNS, TRANSACTION_COLUMNS } from '../export/columns.js';
import { error, warn } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import type { ParseOptions } from '../types.js';

/**
 * Decodes BAI2 content into the CSV selected by the options.
 */
export function renderBai2Csv(content: string, options: ParseOptions): { csv: string; warnings: string[] } {
    const { file, warnings } = parseBai2(content);

    if (options.balances) {
        return { csv: rowsToCsv(toBalanceRows(file), BALANCE_COLUMNS), warnings };
    }
    if (options.details) {
        return { csv: rowsToCsv(toTransactionDetailRows(file), DETAIL_COLUMNS), warnings };
    }
    return { csv: rowsToCsv(toTransactionRows(file), TRANSACTION_COLUMNS), warnings };
}

/**
 * `parse <file>`: decode one file and print CSV to stdout.
 * Warnings go to stderr so the output can be redirected.
 *
 * @returns Process exit code
 */
export async function parseFile(path: string, options: ParseOptions): Promise<number> {
    try {
        const content = await readFile(path, 'utf-8');
        const { csv, warnings } = renderBai2Csv(content, options);
        for (const w of warnings) {
            warn(w);
        }
        process.stdout.write(csv);
        return 0;
    } catch (err) {
        error(`Error parsing ${path}: ${errorMessage(err)}`);
        return 1;
    }
}
