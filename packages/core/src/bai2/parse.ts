/**
 * BAI2 cash management file parser.
 *
 * Format:
 * - One record per line, comma-separated, terminated by "/"
 * - First field is the record type: 01 file, 02 group, 03 account,
 *   16 transaction, 49/98/99 trailers, 88 continuation
 * - 88 records extend the previous record and are joined before dispatch
 *
 * Trailers close their container: a 49 closes the current account as well
 * as the open transaction, so 16 records after it are reported as orphans
 * rather than attached to the closed account. A 98 closes the group.
 *
 * Best-effort: short records default missing fields to '', unknown record
 * types are skipped, a missing trailer leaves its fields empty. Only empty
 * content or content without a file header is fatal.
 */

import { RECORD_TYPE, BAI2_SYNTAX } from '../types/index.js';
import type {
    AccountRecord,
    Bai2ParseResult,
    FileRecord,
    GroupRecord,
    TransactionContext,
    TransactionRecord,
} from './types.js';
import { Bai2EmptyInputError, Bai2FormatError } from './errors.js';
import { joinContinuations, recordTag, splitFields, splitLines } from './lines.js';
import {
    extractFields,
    fieldAt,
    ACCOUNT_BALANCES_START,
    ACCOUNT_HEADER_LAYOUT,
    BALANCE_LAYOUT,
    FILE_HEADER_LAYOUT,
    GROUP_HEADER_LAYOUT,
    TRAILER_LAYOUT,
    TRANSACTION_LAYOUT,
    TRANSACTION_TEXT_START,
} from './fields.js';

/**
 * Currently open container at each level.
 */
interface ParserState {
    group: GroupRecord | null;
    account: AccountRecord | null;
    transaction: TransactionRecord | null;
}

export function createFileRecord(): FileRecord {
    return {
        sender_id: '',
        receiver_id: '',
        file_creation_date: '',
        file_creation_time: '',
        resend_indicator: '',
        record_size: '',
        blocking_factor: '',
        version_number: '',
        groups: [],
        file_control_total: '',
        file_record_count: '',
        orphans: { accounts: [], transactions: [] },
    };
}

const EMPTY_CONTEXT: TransactionContext = {
    account_id: '',
    currency_code: '',
    as_of_date: '',
    as_of_time: '',
    as_of_date_modifier: '',
    bank_id: '',
    customer_id: '',
    file_date: '',
    file_time: '',
};

/**
 * Snapshot of ancestor fields for a new transaction.
 */
function inheritContext(
    file: FileRecord,
    group: GroupRecord,
    account: AccountRecord
): TransactionContext {
    return {
        account_id: account.customer_account,
        currency_code: account.currency_code || group.currency_code,
        as_of_date: group.as_of_date,
        as_of_time: group.as_of_time,
        as_of_date_modifier: group.as_of_date_modifier,
        bank_id: group.originator_id,
        customer_id: group.ultimate_receiver_id,
        file_date: file.file_creation_date,
        file_time: file.file_creation_time,
    };
}

function parseGroupHeader(fields: string[]): GroupRecord {
    return {
        ...extractFields(fields, GROUP_HEADER_LAYOUT),
        accounts: [],
        group_control_total: '',
        group_record_count: '',
    };
}

/**
 * Account header: id, currency, then any number of
 * (type code, amount, item count, funds type) balance quadruples.
 */
function parseAccountHeader(fields: string[]): AccountRecord {
    const account: AccountRecord = {
        ...extractFields(fields, ACCOUNT_HEADER_LAYOUT),
        balances: [],
        transactions: [],
        account_control_total: '',
        account_record_count: '',
    };

    for (let i = ACCOUNT_BALANCES_START; i < fields.length; i += 4) {
        const balance = extractFields(fields.slice(i, i + 4), BALANCE_LAYOUT);
        if (balance.type_code) {
            account.balances.push(balance);
        }
    }

    return account;
}

function parseTransaction(fields: string[], context: TransactionContext): TransactionRecord {
    return {
        ...extractFields(fields, TRANSACTION_LAYOUT),
        // Memo text may itself contain the separator
        text: fields.slice(TRANSACTION_TEXT_START).join(BAI2_SYNTAX.FIELD_SEPARATOR),
        ...context,
    };
}

/**
 * Parse BAI2 file content.
 *
 * @param content - Whole file as text
 * @returns ParseResult-style object with the decoded tree, warnings, skip count
 * @throws Bai2EmptyInputError when content has no records
 * @throws Bai2FormatError when no file header record is present
 */
export function parseBai2(content: string): Bai2ParseResult {
    const rawLines = splitLines(content);
    if (rawLines.length === 0) {
        throw new Bai2EmptyInputError();
    }

    const records = joinContinuations(rawLines);
    if (!records.some(line => recordTag(line) === RECORD_TYPE.FILE_HEADER)) {
        throw new Bai2FormatError(
            `BAI2 parser: No file header (${RECORD_TYPE.FILE_HEADER}) record found in ${records.length} records`,
            records.length
        );
    }

    const file = createFileRecord();
    const state: ParserState = { group: null, account: null, transaction: null };
    const warnings: string[] = [];
    let skippedLines = 0;
    let orphanAccounts = 0;
    let orphanTransactions = 0;

    for (const [index, line] of records.entries()) {
        const fields = splitFields(line);
        const tag = fields[0];

        switch (tag) {
            case RECORD_TYPE.FILE_HEADER:
                Object.assign(file, extractFields(fields, FILE_HEADER_LAYOUT));
                break;

            case RECORD_TYPE.GROUP_HEADER:
                state.group = parseGroupHeader(fields);
                state.account = null;
                state.transaction = null;
                file.groups.push(state.group);
                break;

            case RECORD_TYPE.ACCOUNT_HEADER:
                state.account = parseAccountHeader(fields);
                state.transaction = null;
                if (state.group) {
                    state.group.accounts.push(state.account);
                } else {
                    file.orphans.accounts.push(state.account);
                    orphanAccounts++;
                }
                break;

            case RECORD_TYPE.TRANSACTION: {
                const { group, account } = state;
                const context = group && account ? inheritContext(file, group, account) : EMPTY_CONTEXT;
                state.transaction = parseTransaction(fields, context);
                if (account) {
                    account.transactions.push(state.transaction);
                } else {
                    file.orphans.transactions.push(state.transaction);
                    orphanTransactions++;
                }
                break;
            }

            case RECORD_TYPE.ACCOUNT_TRAILER:
                if (state.account) {
                    state.account.account_control_total = fieldAt(fields, TRAILER_LAYOUT.control_total);
                    state.account.account_record_count = fieldAt(fields, TRAILER_LAYOUT.record_count);
                }
                state.account = null;
                state.transaction = null;
                break;

            case RECORD_TYPE.GROUP_TRAILER:
                if (state.group) {
                    state.group.group_control_total = fieldAt(fields, TRAILER_LAYOUT.control_total);
                    state.group.group_record_count = fieldAt(fields, TRAILER_LAYOUT.record_count);
                }
                state.group = null;
                state.account = null;
                state.transaction = null;
                break;

            case RECORD_TYPE.FILE_TRAILER:
                file.file_control_total = fieldAt(fields, TRAILER_LAYOUT.control_total);
                file.file_record_count = fieldAt(fields, TRAILER_LAYOUT.record_count);
                state.group = null;
                state.account = null;
                state.transaction = null;
                break;

            case RECORD_TYPE.CONTINUATION:
                // Only reachable when the very first record is a continuation
                warnings.push(`Skipped continuation record ${index + 1} with no record to extend`);
                skippedLines++;
                break;

            default:
                warnings.push(`Skipped record ${index + 1} with unknown type "${tag}"`);
                skippedLines++;
        }
    }

    if (orphanAccounts) {
        warnings.push(`${orphanAccounts} account records appeared outside a group and were not exported`);
    }
    if (orphanTransactions) {
        warnings.push(`${orphanTransactions} transaction records appeared outside an account and were not exported`);
    }

    return { file, warnings, skippedLines };
}
