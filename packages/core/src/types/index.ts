/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    TransactionRow,
    TransactionDetailRow,
    BalanceRow,
    MatchedTransactionRow,
    Invoice,
    MatchConfig,
    InvoiceMatchStats,
    InvoiceMatchResult,
} from '@cash-recon/shared';

export {
    RECORD_TYPE,
    BAI2_SYNTAX,
    CREDIT_TYPE_CODE_RANGE,
    DEBIT_TYPE_CODE_RANGE,
    TYPE_CODE_LABELS,
    EXPORT_DEFAULTS,
    MATCHING_CONFIG,
    ROW_KEY,
    MatchConfigSchema,
} from '@cash-recon/shared';
