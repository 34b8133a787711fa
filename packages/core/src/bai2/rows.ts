/**
 * Row projections of a decoded BAI2 file.
 *
 * PURE FUNCTIONS: walk file -> groups -> accounts -> leaves in file order
 * and emit one flat row per leaf. Orphan records are not exported.
 */

import type { BalanceRow, TransactionDetailRow, TransactionRow } from '../types/index.js';
import { EXPORT_DEFAULTS } from '../types/index.js';
import type { AccountRecord, FileRecord, GroupRecord, TransactionRecord } from './types.js';
import { isCreditTypeCode, typeCodeLabel } from '../utils/type-code.js';
import { formatMinorUnits } from '../utils/amount.js';
import { formatBaiDate } from '../utils/date-format.js';

/**
 * Constant columns of the compact transaction export.
 */
export interface TransactionRowOptions {
    accountTitle?: string;
    entity?: string;
}

function* eachAccount(file: FileRecord): Generator<[GroupRecord, AccountRecord]> {
    for (const group of file.groups) {
        for (const account of group.accounts) {
            yield [group, account];
        }
    }
}

/**
 * One fully denormalized row per account balance entry.
 */
export function toBalanceRows(file: FileRecord): BalanceRow[] {
    const rows: BalanceRow[] = [];

    for (const [group, account] of eachAccount(file)) {
        for (const balance of account.balances) {
            rows.push({
                file_sender_id: file.sender_id,
                file_receiver_id: file.receiver_id,
                file_creation_date: file.file_creation_date,
                file_creation_time: file.file_creation_time,
                resend_indicator: file.resend_indicator,
                group_originator_id: group.originator_id,
                group_receiver_id: group.ultimate_receiver_id,
                group_status: group.group_status,
                as_of_date: group.as_of_date,
                as_of_time: group.as_of_time,
                as_of_date_modifier: group.as_of_date_modifier,
                currency_code: account.currency_code || group.currency_code,
                customer_account: account.customer_account,
                balance_type_code: balance.type_code,
                balance_amount: balance.amount,
                balance_item_count: balance.item_count,
                balance_funds_type: balance.funds_type,
                account_control_total: account.account_control_total,
                account_record_count: account.account_record_count,
                group_control_total: group.group_control_total,
                group_record_count: group.group_record_count,
                file_control_total: file.file_control_total,
                file_record_count: file.file_record_count,
            });
        }
    }

    return rows;
}

/**
 * One fully denormalized row per transaction, raw values.
 */
export function toTransactionDetailRows(file: FileRecord): TransactionDetailRow[] {
    const rows: TransactionDetailRow[] = [];

    for (const [group, account] of eachAccount(file)) {
        for (const txn of account.transactions) {
            rows.push({
                file_sender_id: file.sender_id,
                file_receiver_id: file.receiver_id,
                file_creation_date: file.file_creation_date,
                file_creation_time: file.file_creation_time,
                group_originator_id: group.originator_id,
                group_receiver_id: group.ultimate_receiver_id,
                group_status: group.group_status,
                as_of_date: txn.as_of_date,
                as_of_time: txn.as_of_time,
                as_of_date_modifier: txn.as_of_date_modifier,
                currency_code: txn.currency_code,
                customer_account: account.customer_account,
                type_code: txn.type_code,
                amount: txn.amount,
                funds_type: txn.funds_type,
                bank_ref: txn.bank_ref,
                customer_ref: txn.customer_ref,
                text: txn.text,
                account_control_total: account.account_control_total,
                account_record_count: account.account_record_count,
                group_control_total: group.group_control_total,
                group_record_count: group.group_record_count,
                file_control_total: file.file_control_total,
                file_record_count: file.file_record_count,
            });
        }
    }

    return rows;
}

/**
 * Compact row for a single transaction, built from its inherited context.
 */
export function transactionToRow(txn: TransactionRecord, options: TransactionRowOptions = {}): TransactionRow {
    const isCredit = isCreditTypeCode(txn.type_code);
    const amount = formatMinorUnits(txn.amount);

    return {
        date: formatBaiDate(txn.as_of_date),
        bank_id: txn.bank_id,
        account_number: txn.account_id,
        account_title: options.accountTitle ?? EXPORT_DEFAULTS.ACCOUNT_TITLE,
        entity: options.entity ?? EXPORT_DEFAULTS.ENTITY,
        tran_type: typeCodeLabel(txn.type_code),
        bai_type_code: txn.type_code,
        currency: txn.currency_code,
        credit_amount: isCredit ? amount : '',
        debit_amount: isCredit ? '' : amount,
        bank_ref: txn.bank_ref,
        end_to_end_id: '',
        customer_ref: txn.customer_ref,
        description: txn.text,
        reason_for_payment: '',
        notes: '',
    };
}

/**
 * One compact row per transaction with derived type label, M/D/YYYY date
 * and the amount in either the credit or the debit column.
 */
export function toTransactionRows(file: FileRecord, options: TransactionRowOptions = {}): TransactionRow[] {
    const rows: TransactionRow[] = [];

    for (const [, account] of eachAccount(file)) {
        for (const txn of account.transactions) {
            rows.push(transactionToRow(txn, options));
        }
    }

    return rows;
}
