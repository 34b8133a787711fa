/**
 * In-memory model of a decoded BAI2 file.
 *
 * Ownership is strictly top-down: a file owns its groups, a group its
 * accounts, an account its balances and transactions. Array order is
 * file order. Trailer fields stay '' until the trailer record is seen.
 */

/**
 * Ancestor context copied onto a transaction when it is created.
 * A value, not a back-reference.
 */
export interface TransactionContext {
    account_id: string;
    currency_code: string;      // account currency, falling back to the group's
    as_of_date: string;
    as_of_time: string;
    as_of_date_modifier: string;
    bank_id: string;            // group originator
    customer_id: string;        // group ultimate receiver
    file_date: string;
    file_time: string;
}

export interface TransactionRecord extends TransactionContext {
    type_code: string;
    amount: string;             // integer string, minor units
    funds_type: string;
    bank_ref: string;
    customer_ref: string;
    text: string;
}

export interface BalanceEntry {
    type_code: string;
    amount: string;
    item_count: string;
    funds_type: string;
}

export interface AccountRecord {
    customer_account: string;
    currency_code: string;
    balances: BalanceEntry[];
    transactions: TransactionRecord[];
    account_control_total: string;
    account_record_count: string;
}

export interface GroupRecord {
    ultimate_receiver_id: string;
    originator_id: string;
    group_status: string;
    as_of_date: string;
    as_of_time: string;
    currency_code: string;
    as_of_date_modifier: string;
    accounts: AccountRecord[];
    group_control_total: string;
    group_record_count: string;
}

/**
 * Records that arrived without an open parent container.
 * Kept for inspection; row projections never read them.
 */
export interface OrphanRecords {
    accounts: AccountRecord[];
    transactions: TransactionRecord[];
}

export interface FileRecord {
    sender_id: string;
    receiver_id: string;
    file_creation_date: string;
    file_creation_time: string;
    resend_indicator: string;
    record_size: string;
    blocking_factor: string;
    version_number: string;
    groups: GroupRecord[];
    file_control_total: string;
    file_record_count: string;
    orphans: OrphanRecords;
}

/**
 * Result returned by parseBai2.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export interface Bai2ParseResult {
    file: FileRecord;
    warnings: string[];
    skippedLines: number;
}
