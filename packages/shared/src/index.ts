// Schemas
export {
    TransactionRowSchema,
    TransactionDetailRowSchema,
    BalanceRowSchema,
    MatchedTransactionRowSchema,
    InvoiceSchema,
    InvoiceListSchema,
    MatchConfigSchema,
    InvoiceMatchStatsSchema,
    InvoiceMatchResultSchema,
    ReconConfigSchema,
    RunManifestSchema,
    RunLogEntrySchema,
    RunLogSchema,
} from './schemas.js';

// Types
export type {
    TransactionRow,
    TransactionDetailRow,
    BalanceRow,
    MatchedTransactionRow,
    Invoice,
    MatchConfig,
    InvoiceMatchStats,
    InvoiceMatchResult,
    ReconConfig,
    RunManifest,
    RunLogEntry,
} from './schemas.js';

// Constants
export {
    RECORD_TYPE,
    BAI2_SYNTAX,
    CREDIT_TYPE_CODE_RANGE,
    DEBIT_TYPE_CODE_RANGE,
    TYPE_CODE_LABELS,
    EXPORT_DEFAULTS,
    MATCHING_CONFIG,
    ROW_KEY,
    RUN_LOG,
} from './constants.js';

export type { RecordType } from './constants.js';
