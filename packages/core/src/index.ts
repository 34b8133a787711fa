// Types (re-exported from shared)
export type {
    TransactionRow,
    TransactionDetailRow,
    BalanceRow,
    MatchedTransactionRow,
    Invoice,
    MatchConfig,
    InvoiceMatchStats,
    InvoiceMatchResult,
} from './types/index.js';

export {
    RECORD_TYPE,
    BAI2_SYNTAX,
    CREDIT_TYPE_CODE_RANGE,
    DEBIT_TYPE_CODE_RANGE,
    TYPE_CODE_LABELS,
    EXPORT_DEFAULTS,
    MATCHING_CONFIG,
    ROW_KEY,
} from './types/index.js';

// BAI2 decoding
export {
    parseBai2,
    isBai2Filename,
    looksLikeBai2,
    joinContinuations,
    splitFields,
    extractFields,
    fieldAt,
    toBalanceRows,
    toTransactionRows,
    toTransactionDetailRows,
    transactionToRow,
    Bai2Error,
    Bai2EmptyInputError,
    Bai2FormatError,
} from './bai2/index.js';
export type {
    FileRecord,
    GroupRecord,
    AccountRecord,
    BalanceEntry,
    TransactionRecord,
    TransactionContext,
    Bai2ParseResult,
    TransactionRowOptions,
} from './bai2/index.js';

// Invoice matching
export { matchInvoices, findBestInvoice, scoreInvoice, nameSimilarity, buildInvoiceUrl } from './matcher/index.js';
export type { InvoiceMatcherOptions, BestInvoiceResult, InvoiceScore } from './matcher/index.js';

// Utils
export {
    isCreditTypeCode,
    isDebitTypeCode,
    typeCodeLabel,
    formatMinorUnits,
    parseDisplayAmount,
    formatBaiDate,
    generateRowKey,
    dedupeRows,
} from './utils/index.js';
