/**
 * BAI2 module: bank cash-position file decoding and row projections.
 */

export { parseBai2, createFileRecord } from './parse.js';
export { joinContinuations, splitFields, splitLines, recordTag } from './lines.js';
export { isBai2Filename, looksLikeBai2 } from './detect.js';
export { extractFields, fieldAt } from './fields.js';
export type { FieldLayout } from './fields.js';
export { toBalanceRows, toTransactionRows, toTransactionDetailRows, transactionToRow } from './rows.js';
export type { TransactionRowOptions } from './rows.js';
export { Bai2Error, Bai2EmptyInputError, Bai2FormatError } from './errors.js';
export type {
    FileRecord,
    GroupRecord,
    AccountRecord,
    BalanceEntry,
    TransactionRecord,
    TransactionContext,
    OrphanRecords,
    Bai2ParseResult,
} from './types.js';
