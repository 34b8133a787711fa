import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { amountScore, invoiceAmount, nameScore, scoreInvoice } from '../../src/matcher/score.js';
import { DEFAULT_CONFIG, makeInvoice } from '../fixtures/invoices.js';

const d = (value: string) => new Decimal(value);

describe('amountScore', () => {
    it('gives exact points below one cent of difference', () => {
        expect(amountScore(d('1000'), d('1000'), DEFAULT_CONFIG)).toBe(50);
        expect(amountScore(d('1000'), d('1000.009'), DEFAULT_CONFIG)).toBe(50);
    });

    it('treats exactly one cent as close, not exact', () => {
        expect(amountScore(d('1000'), d('1000.01'), DEFAULT_CONFIG)).toBe(30);
    });

    it('gives close points within 1% of the larger amount', () => {
        expect(amountScore(d('1000'), d('1005'), DEFAULT_CONFIG)).toBe(30);
        expect(amountScore(d('1000'), d('1010'), DEFAULT_CONFIG)).toBe(30);
        expect(amountScore(d('1000'), d('990'), DEFAULT_CONFIG)).toBe(30);
    });

    it('gives nothing beyond 1%', () => {
        expect(amountScore(d('1000'), d('1011'), DEFAULT_CONFIG)).toBe(0);
        expect(amountScore(d('1000'), d('1200'), DEFAULT_CONFIG)).toBe(0);
    });

    it('gives nothing when either amount is not positive', () => {
        expect(amountScore(d('1000'), d('0'), DEFAULT_CONFIG)).toBe(0);
        expect(amountScore(d('0'), d('0'), DEFAULT_CONFIG)).toBe(0);
        expect(amountScore(d('-5'), d('-5'), DEFAULT_CONFIG)).toBe(0);
    });
});

describe('nameScore', () => {
    it('scales similarity onto the name points', () => {
        expect(nameScore('ACH CREDIT ACME CORP', 'Acme Corp', DEFAULT_CONFIG)).toBe(50);
        expect(nameScore('XYZ', 'Acme Corp', DEFAULT_CONFIG)).toBe(0);
    });

    it('rounds a partial similarity to whole points', () => {
        // 94.12% of 50 points
        expect(nameScore('ACMECORP', 'Acme Corp', DEFAULT_CONFIG)).toBe(47);
    });

    it('is 0 for an empty memo or customer name', () => {
        expect(nameScore('', 'Acme Corp', DEFAULT_CONFIG)).toBe(0);
        expect(nameScore('ACME CORP', '', DEFAULT_CONFIG)).toBe(0);
    });

    it('respects a custom maximum', () => {
        expect(nameScore('ACME CORP', 'Acme Corp', { ...DEFAULT_CONFIG, nameMaxPoints: 40 })).toBe(40);
    });
});

describe('invoiceAmount', () => {
    it('treats an unparseable amount as zero', () => {
        expect(invoiceAmount(makeInvoice({ amount_remaining: 'n/a' })).toString()).toBe('0');
    });
});

describe('scoreInvoice', () => {
    it('adds the amount and name components', () => {
        const score = scoreInvoice(d('1000'), 'ACH CREDIT ACME CORP', makeInvoice({ amount_remaining: '1005' }), DEFAULT_CONFIG);
        expect(score).toEqual({ amount: 30, name: 50, total: 80 });
    });
});
