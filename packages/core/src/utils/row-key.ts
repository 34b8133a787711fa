/**
 * Row keys for recognising a transaction row across files and runs.
 *
 * Uses js-sha256 so the core stays free of Node built-ins.
 */

import { sha256 } from 'js-sha256';
import type { TransactionRow } from '../types/index.js';
import { ROW_KEY } from '../types/index.js';

type RowIdentity = Pick<
    TransactionRow,
    'date' | 'bai_type_code' | 'credit_amount' | 'debit_amount' | 'description' | 'bank_ref'
>;

/**
 * Deterministic row key via SHA-256.
 *
 * Payload format:
 * "{date}|{bai_type_code}|{credit_amount}|{debit_amount}|{description}|{bank_ref}"
 * using the exported (formatted) values, so a key computed from a
 * previous export matches one computed from a fresh parse. Debits carry
 * their amount too: two debits with the same memo on the same day differ.
 *
 * @returns 16-character hex key
 */
export function generateRowKey(row: RowIdentity): string {
    const payload = [
        row.date,
        row.bai_type_code,
        row.credit_amount,
        row.debit_amount,
        row.description,
        row.bank_ref,
    ].join('|');
    return sha256(payload).slice(0, ROW_KEY.LENGTH);
}

export interface DedupeResult<T> {
    rows: T[];
    keys: string[];
    removed: number;
}

/**
 * Drop rows whose key is in `seen`.
 *
 * Rows sharing a key within `rows` are all kept: one statement can list
 * the same-looking transaction twice, and both are real.
 *
 * PURE FUNCTION: neither argument is mutated.
 *
 * @param rows - Candidate rows of one file, in file order
 * @param keyOf - Key for a row, usually generateRowKey
 * @param seen - Keys known from earlier files or runs
 * @returns Kept rows with their keys, and how many were dropped
 */
export function dedupeRows<T>(
    rows: readonly T[],
    keyOf: (row: T) => string,
    seen: ReadonlySet<string> = new Set()
): DedupeResult<T> {
    const kept: T[] = [];
    const keys: string[] = [];
    let removed = 0;

    for (const row of rows) {
        const key = keyOf(row);
        if (seen.has(key)) {
            removed++;
            continue;
        }
        kept.push(row);
        keys.push(key);
    }

    return { rows: kept, keys, removed };
}
