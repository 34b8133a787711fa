/**
 * BAI2 type code classification.
 * The test is numeric only: codes are compared as integers.
 */

import { CREDIT_TYPE_CODE_RANGE, DEBIT_TYPE_CODE_RANGE, TYPE_CODE_LABELS } from '../types/index.js';

function parseTypeCode(code: string): number | null {
    const trimmed = code.trim();
    if (!/^\d+$/.test(trimmed)) return null;
    return parseInt(trimmed, 10);
}

/**
 * True when the code is in the credit range (money in), 100-399 inclusive.
 * Non-numeric and out-of-range codes are not credits.
 */
export function isCreditTypeCode(code: string): boolean {
    const n = parseTypeCode(code);
    return n !== null && n >= CREDIT_TYPE_CODE_RANGE.min && n <= CREDIT_TYPE_CODE_RANGE.max;
}

/**
 * True when the code is in the debit range (money out), 400-699 inclusive.
 */
export function isDebitTypeCode(code: string): boolean {
    const n = parseTypeCode(code);
    return n !== null && n >= DEBIT_TYPE_CODE_RANGE.min && n <= DEBIT_TYPE_CODE_RANGE.max;
}

/**
 * Human-readable label for a type code.
 */
export function typeCodeLabel(code: string): string {
    if (Object.hasOwn(TYPE_CODE_LABELS, code)) return TYPE_CODE_LABELS[code];
    return `${isCreditTypeCode(code) ? 'Credit' : 'Debit'} (${code})`;
}
