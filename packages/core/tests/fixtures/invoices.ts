import { MatchConfigSchema, type Invoice, type MatchConfig, type TransactionRow } from '@cash-recon/shared';

export const DEFAULT_CONFIG: MatchConfig = MatchConfigSchema.parse({});

export function makeInvoice(overrides: Partial<Invoice> = {}): Invoice {
    return {
        id: '1',
        number: 'INV-0001',
        customer_name: 'Acme Corp',
        amount_remaining: '1000.00',
        currency: 'USD',
        due_date: '2026-02-01',
        ...overrides,
    };
}

export function makeRow(overrides: Partial<TransactionRow> = {}): TransactionRow {
    return {
        date: '1/14/2026',
        bank_id: '121000358',
        account_number: '1234567890',
        account_title: 'AR Account',
        entity: '',
        tran_type: 'ACH CREDIT',
        bai_type_code: '169',
        currency: 'USD',
        credit_amount: '1,000.00',
        debit_amount: '',
        bank_ref: 'BR0001',
        end_to_end_id: '',
        customer_ref: '',
        description: 'ACH CREDIT ACME CORP INV 1001',
        reason_for_payment: '',
        notes: '',
        ...overrides,
    };
}
