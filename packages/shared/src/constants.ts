/**
 * Constants for the cash reconciliation engine.
 */

/**
 * BAI2 record type tags. The tag is always the first field of a record.
 */
export const RECORD_TYPE = {
    FILE_HEADER: '01',
    GROUP_HEADER: '02',
    ACCOUNT_HEADER: '03',
    TRANSACTION: '16',
    ACCOUNT_TRAILER: '49',
    CONTINUATION: '88',
    GROUP_TRAILER: '98',
    FILE_TRAILER: '99',
} as const;

export type RecordType = (typeof RECORD_TYPE)[keyof typeof RECORD_TYPE];

/**
 * BAI2 delimiters.
 */
export const BAI2_SYNTAX = {
    FIELD_SEPARATOR: ',',
    RECORD_TERMINATOR: '/',
} as const;

/**
 * Type code ranges. 100-399 is money in, 400-699 is money out.
 */
export const CREDIT_TYPE_CODE_RANGE = { min: 100, max: 399 } as const;
export const DEBIT_TYPE_CODE_RANGE = { min: 400, max: 699 } as const;

/**
 * Display labels for the type codes seen on the receivables account.
 * Codes missing here fall back to "Credit (<code>)" / "Debit (<code>)".
 */
export const TYPE_CODE_LABELS: Readonly<Record<string, string>> = {
    '169': 'ACH CREDIT',
    '174': 'Miscellaneous ACH Credit',
    '195': 'WIRE TRANSFER CREDIT',
    '214': 'FX Wire Transfer Credit',
    '301': 'MOBILE DEPOSIT',
    '469': 'ACH DEBIT',
    '495': 'WIRE TRANSFER DEBIT',
    '496': 'FX Wire Transfer Debit',
    '575': 'ZERO BAL TRF DEBIT',
};

/**
 * Defaults for the compact transaction export.
 */
export const EXPORT_DEFAULTS = {
    ACCOUNT_TITLE: 'AR Account',
    ENTITY: '',
} as const;

/**
 * Invoice matching configuration.
 * Scores are out of MAX_SCORE; a match needs MIN_SCORE.
 */
export const MATCHING_CONFIG = {
    AMOUNT_EXACT_POINTS: 50,
    AMOUNT_CLOSE_POINTS: 30,
    AMOUNT_EXACT_TOLERANCE: '0.01',
    AMOUNT_CLOSE_RATIO: '0.01',
    NAME_MAX_POINTS: 50,
    MIN_SCORE: 60,
    MAX_SCORE: 100,
    LINK_LABEL: 'Open invoice',
} as const;

/**
 * Row key configuration (hex characters kept from the SHA-256 digest).
 */
export const ROW_KEY = {
    LENGTH: 16,
} as const;

/**
 * Run log retention.
 */
export const RUN_LOG = {
    MAX_ENTRIES: 100,
} as const;
