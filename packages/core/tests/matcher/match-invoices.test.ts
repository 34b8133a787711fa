import { describe, it, expect } from 'vitest';
import { matchInvoices } from '../../src/matcher/match-invoices.js';
import { buildInvoiceUrl, hyperlinkFormula, resolveInvoiceUrl } from '../../src/matcher/invoice-url.js';
import { makeInvoice, makeRow } from '../fixtures/invoices.js';

const TEMPLATE = 'https://erp.example.com/invoices/{id}';

describe('matchInvoices', () => {
    const acme = makeInvoice({ id: '42', number: 'INV-1001', customer_name: 'Acme Corp', amount_remaining: '1000.00' });

    it('fills the match columns for an accepted invoice', () => {
        const result = matchInvoices([makeRow()], [acme], { invoiceUrlTemplate: TEMPLATE });
        expect(result.rows[0]).toEqual({
            ...makeRow(),
            matched_customer: 'Acme Corp',
            invoice_number: 'INV-1001',
            confidence: '100%',
            invoice_link: '=HYPERLINK("https://erp.example.com/invoices/42","Open invoice")',
        });
        expect(result.warnings).toEqual([]);
    });

    it('leaves debit rows unmatched even when an invoice would fit', () => {
        const debit = makeRow({ tran_type: 'ACH DEBIT', bai_type_code: '469', credit_amount: '', debit_amount: '1,000.00' });
        const result = matchInvoices([debit], [acme]);
        expect(result.rows[0]).toEqual({
            ...debit,
            matched_customer: '',
            invoice_number: '',
            confidence: '',
            invoice_link: '',
        });
        expect(result.stats.credit_rows).toBe(0);
    });

    it('leaves rows with a zero or unreadable credit unmatched', () => {
        const rows = [makeRow({ credit_amount: '0.00' }), makeRow({ credit_amount: 'N/A' })];
        const result = matchInvoices(rows, [acme]);
        expect(result.rows.map(r => r.invoice_number)).toEqual(['', '']);
        expect(result.stats.credit_rows).toBe(0);
    });

    it('leaves a below-threshold best candidate unmatched', () => {
        const result = matchInvoices([makeRow({ credit_amount: '1,200.00' })], [acme]);
        expect(result.rows[0].invoice_number).toBe('');
        expect(result.rows[0].confidence).toBe('');
        expect(result.stats).toEqual({
            total_rows: 1,
            credit_rows: 1,
            matched: 0,
            below_threshold: 1,
            invoices_considered: 1,
        });
    });

    it('leaves everything unmatched when there are no invoices', () => {
        const rows = [makeRow(), makeRow({ bank_ref: 'BR0002' }), makeRow({ credit_amount: '', debit_amount: '5.00' })];
        const result = matchInvoices(rows, []);
        expect(result.rows.every(r => r.invoice_number === '' && r.invoice_link === '')).toBe(true);
        expect(result.warnings).toEqual(['No open invoices supplied; 2 credit rows left unmatched']);
    });

    it('prefers the invoice URL over the template', () => {
        const withUrl = makeInvoice({ ...acme, url: 'https://pay.example.com/i/42' });
        const result = matchInvoices([makeRow()], [withUrl], { invoiceUrlTemplate: TEMPLATE });
        expect(result.rows[0].invoice_link).toBe('=HYPERLINK("https://pay.example.com/i/42","Open invoice")');
    });

    it('warns when a matched invoice has no URL', () => {
        const result = matchInvoices([makeRow()], [acme]);
        expect(result.rows[0].invoice_number).toBe('INV-1001');
        expect(result.rows[0].invoice_link).toBe('');
        expect(result.warnings).toEqual(['No URL available for matched invoices: INV-1001']);
    });

    it('caps confidence at 100%', () => {
        const result = matchInvoices([makeRow()], [acme], { config: { amountExactPoints: 60 } });
        expect(result.rows[0].confidence).toBe('100%');
    });

    it('reports a partial confidence', () => {
        const result = matchInvoices([makeRow({ credit_amount: '995.00' })], [acme]);
        expect(result.rows[0].confidence).toBe('80%');
    });

    it('accepts a run-together name at the exact amount', () => {
        const result = matchInvoices([makeRow({ description: 'ACMECORP' })], [acme]);
        expect(result.rows[0].invoice_number).toBe('INV-1001');
        expect(result.rows[0].confidence).toBe('97%');
    });

    it('rejects a close amount whose name shares only one word', () => {
        const industries = makeInvoice({ customer_name: 'ACME INDUSTRIES LLC', amount_remaining: '1000.00' });
        const result = matchInvoices([makeRow({ credit_amount: '995.00', description: 'PAYMENT ACME' })], [industries]);
        expect(result.rows[0].invoice_number).toBe('');
        expect(result.stats.below_threshold).toBe(1);
    });

    it('applies configuration overrides', () => {
        const result = matchInvoices([makeRow({ credit_amount: '1,200.00' })], [acme], {
            config: { minScore: 50, linkLabel: 'View' },
            invoiceUrlTemplate: TEMPLATE,
        });
        expect(result.rows[0].confidence).toBe('50%');
        expect(result.rows[0].invoice_link).toBe('=HYPERLINK("https://erp.example.com/invoices/42","View")');
    });

    it('preserves row order and count', () => {
        const rows = [
            makeRow({ bank_ref: 'A', credit_amount: '', debit_amount: '1.00' }),
            makeRow({ bank_ref: 'B' }),
            makeRow({ bank_ref: 'C', credit_amount: '7.00' }),
        ];
        const result = matchInvoices(rows, [acme]);
        expect(result.rows.map(r => r.bank_ref)).toEqual(['A', 'B', 'C']);
        expect(result.stats.total_rows).toBe(3);
    });

    it('does not modify its inputs and is repeatable', () => {
        const rows = [makeRow()];
        const invoices = [acme];
        const rowsCopy = structuredClone(rows);
        const invoicesCopy = structuredClone(invoices);

        const first = matchInvoices(rows, invoices, { invoiceUrlTemplate: TEMPLATE });
        const second = matchInvoices(rows, invoices, { invoiceUrlTemplate: TEMPLATE });

        expect(second).toEqual(first);
        expect(rows).toEqual(rowsCopy);
        expect(invoices).toEqual(invoicesCopy);
    });
});

describe('invoice links', () => {
    it('encodes the id into the template', () => {
        expect(buildInvoiceUrl('https://erp.example.com/inv?id={id}', 'A B/1')).toBe('https://erp.example.com/inv?id=A%20B%2F1');
    });

    it('resolves to an empty string without URL or template', () => {
        expect(resolveInvoiceUrl(makeInvoice())).toBe('');
    });

    it('doubles quotes inside the formula', () => {
        expect(hyperlinkFormula('https://x.example.com/?q="a"', 'Open')).toBe('=HYPERLINK("https://x.example.com/?q=""a""","Open")');
    });
});
