import { describe, it, expect } from 'vitest';
import { sha256 } from 'js-sha256';
import { dedupeRows, generateRowKey } from '../../src/utils/row-key.js';

const row = {
    date: '1/14/2026',
    bai_type_code: '169',
    credit_amount: '1,500.00',
    debit_amount: '',
    description: 'ACH CREDIT ACME CORP',
    bank_ref: 'BR0001',
};

describe('generateRowKey', () => {
    it('is the first 16 hex characters of the SHA-256 of the identity fields', () => {
        const expected = sha256('1/14/2026|169|1,500.00||ACH CREDIT ACME CORP|BR0001').slice(0, 16);
        expect(generateRowKey(row)).toBe(expected);
        expect(generateRowKey(row)).toMatch(/^[0-9a-f]{16}$/);
    });

    it('changes when any identity field changes', () => {
        const key = generateRowKey(row);
        expect(generateRowKey({ ...row, bank_ref: 'BR0002' })).not.toBe(key);
        expect(generateRowKey({ ...row, credit_amount: '1,500.01' })).not.toBe(key);
        expect(generateRowKey({ ...row, bai_type_code: '195' })).not.toBe(key);
    });

    it('tells apart debits that differ only by amount', () => {
        const debit = { ...row, bai_type_code: '469', credit_amount: '', description: 'ACH DEBIT PAYROLL' };
        expect(generateRowKey({ ...debit, debit_amount: '120.00' }))
            .not.toBe(generateRowKey({ ...debit, debit_amount: '9,850.00' }));
    });

    it('ignores other columns', () => {
        const withNotes = { ...row, notes: 'checked', account_title: 'AR Account' };
        expect(generateRowKey(withNotes)).toBe(generateRowKey(row));
    });
});

describe('dedupeRows', () => {
    const keyOf = (r: { id: string }) => r.id;

    it('keeps repeats within the input', () => {
        const a1 = { id: 'a', n: 1 };
        const a2 = { id: 'a', n: 2 };
        const b = { id: 'b', n: 3 };
        const result = dedupeRows([a1, b, a2], keyOf);
        expect(result.rows).toEqual([a1, b, a2]);
        expect(result.keys).toEqual(['a', 'b', 'a']);
        expect(result.removed).toBe(0);
    });

    it('drops rows whose key was already seen', () => {
        const result = dedupeRows([{ id: 'a' }, { id: 'b' }, { id: 'a' }], keyOf, new Set(['a']));
        expect(result.rows).toEqual([{ id: 'b' }]);
        expect(result.keys).toEqual(['b']);
        expect(result.removed).toBe(2);
    });

    it('does not modify the seen set', () => {
        const seen = new Set(['a']);
        dedupeRows([{ id: 'b' }], keyOf, seen);
        expect([...seen]).toEqual(['a']);
    });
});
