import {
    BalanceRowSchema,
    TransactionDetailRowSchema,
    type BalanceRow,
    type MatchedTransactionRow,
    type TransactionDetailRow,
    type TransactionRow,
} from '@cash-recon/shared';

export interface Column<T> {
    header: string;
    key: keyof T & string;
}

/**
 * Compact transaction export, in the bank statement layout AR expects.
 */
export const TRANSACTION_COLUMNS: readonly Column<TransactionRow>[] = [
    { header: 'Date', key: 'date' },
    { header: 'Bank ID', key: 'bank_id' },
    { header: 'Account Number', key: 'account_number' },
    { header: 'Account Title', key: 'account_title' },
    { header: 'Entity', key: 'entity' },
    { header: 'Tran Type', key: 'tran_type' },
    { header: 'BAI Type Code', key: 'bai_type_code' },
    { header: 'Currency', key: 'currency' },
    { header: 'Credit Amount', key: 'credit_amount' },
    { header: 'Debit Amount', key: 'debit_amount' },
    { header: 'Bank Ref #', key: 'bank_ref' },
    { header: 'End to End ID', key: 'end_to_end_id' },
    { header: 'Customer Ref #', key: 'customer_ref' },
    { header: 'Description', key: 'description' },
    { header: 'Reason for Payment', key: 'reason_for_payment' },
    { header: 'Notes', key: 'notes' },
];

export const MATCHED_COLUMNS: readonly Column<MatchedTransactionRow>[] = [
    ...TRANSACTION_COLUMNS,
    { header: 'Matched Customer', key: 'matched_customer' },
    { header: 'Invoice #', key: 'invoice_number' },
    { header: 'Confidence', key: 'confidence' },
    { header: 'Invoice Link', key: 'invoice_link' },
];

function fieldColumns<K extends string>(keys: readonly K[]): Column<Record<K, string>>[] {
    return keys.map(key => ({ header: key, key }));
}

// Denormalized exports use the field names as headers.
export const BALANCE_COLUMNS: readonly Column<BalanceRow>[] = fieldColumns(BalanceRowSchema.keyof().options);

export const DETAIL_COLUMNS: readonly Column<TransactionDetailRow>[] = fieldColumns(
    TransactionDetailRowSchema.keyof().options
);
