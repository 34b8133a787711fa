import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import exceljs from 'exceljs';
import { RunLogSchema, RunManifestSchema } from '@cash-recon/shared';
import { processMonth, validateMonth } from '../src/commands/process.js';
import { run } from '../src/index.js';
import { createTempWorkspace, readFixture, writeWorkspaceFile } from './helpers.js';

const CONFIG = [
    'entity: US01',
    'account_title: Operating',
    'invoice_url_template: https://erp.example.com/invoices/{id}',
    '',
].join('\n');

const INVOICES = JSON.stringify({
    invoices: [
        { id: 42, number: 'INV-1001', customer_name: 'Acme Corp', amount_remaining: '1500.00' },
        { id: 43, number: 'INV-1002', customer_name: 'Globex', amount_remaining: '980.00' },
    ],
});

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

describe('E2E: process command', () => {
    let root: string;
    let cleanup: () => Promise<void>;
    const options = () => ({ dryRun: false, force: false, yes: true, workspace: root });

    beforeEach(async () => {
        ({ root, cleanup } = await createTempWorkspace(CONFIG));
        await writeWorkspaceFile(root, 'imports/2026-01/20260114.bai', await readFixture('20260114.bai'));
        await writeWorkspaceFile(root, 'invoices/open-invoices.json', INVOICES);
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await cleanup();
    });

    it('decodes, matches, exports and archives a month', async () => {
        expect(await processMonth('2026-01', options())).toBe(0);

        const out = join(root, 'outputs', '2026-01');
        const transactions = (await readFile(join(out, 'transactions.csv'), 'utf-8')).split('\n');
        expect(transactions[1]).toBe(
            '1/14/2026,121000358,1234567890,Operating,US01,ACH CREDIT,169,USD,"1,500.00",,BR0001,,CR0001,ACH CREDIT ACME CORP INV 1001,,'
        );
        expect(transactions[2]).toBe(
            '1/14/2026,121000358,1234567890,Operating,US01,ACH DEBIT,469,USD,,250.00,BR0002,,,ACH DEBIT PAYROLL,,'
        );
        expect((await readFile(join(out, 'balances.csv'), 'utf-8')).split('\n')).toHaveLength(4);
        expect((await readFile(join(out, 'transaction_details.csv'), 'utf-8')).split('\n')).toHaveLength(4);

        const manifest = RunManifestSchema.parse(JSON.parse(await readFile(join(out, 'run_manifest.json'), 'utf-8')));
        expect(manifest.month).toBe('2026-01');
        expect(manifest.transaction_count).toBe(2);
        expect(manifest.row_keys).toHaveLength(2);
        expect(manifest.matched_row_keys).toEqual([manifest.row_keys[0]]);
        expect(Object.keys(manifest.input_files)).toEqual(['20260114.bai']);

        const workbook = new exceljs.Workbook();
        await workbook.xlsx.readFile(join(out, 'cash_application.xlsx'));
        const sheet = workbook.getWorksheet('Cash Application');
        expect(sheet?.getRow(2).getCell(17).value).toBe('Acme Corp');
        expect(sheet?.getRow(2).getCell(18).value).toBe('INV-1001');
        expect(sheet?.getRow(2).getCell(19).value).toBe('100%');

        const log = RunLogSchema.parse(JSON.parse(await readFile(join(root, 'outputs', 'run_log.json'), 'utf-8')));
        expect(log).toHaveLength(1);
        expect(log[0]).toMatchObject({
            status: 'success',
            month: '2026-01',
            input_files: ['20260114.bai'],
            balance_rows: 2,
            transaction_rows: 2,
            invoices_loaded: 2,
            matches_found: 1,
            error: null,
        });

        expect(await exists(join(root, 'archive', '2026-01', 'raw', '20260114.bai'))).toBe(true);
        expect(await exists(join(root, 'imports', '2026-01', '20260114.bai'))).toBe(false);
    });

    it('refuses to reprocess a month without --force', async () => {
        expect(await processMonth('2026-01', options())).toBe(0);
        await writeWorkspaceFile(root, 'imports/2026-01/20260114.bai', await readFixture('20260114.bai'));

        expect(await processMonth('2026-01', options())).toBe(1);

        const log = RunLogSchema.parse(JSON.parse(await readFile(join(root, 'outputs', 'run_log.json'), 'utf-8')));
        expect(log.map(e => e.status)).toEqual(['error', 'success']);
        expect(log[0].error).toBe('Output for 2026-01 already exists (found: balances.csv, transactions.csv, transaction_details.csv, cash_application.xlsx, run_manifest.json). Use --force to overwrite.');
    });

    it('skips transactions already processed in an earlier month', async () => {
        expect(await processMonth('2026-01', options())).toBe(0);
        await writeWorkspaceFile(root, 'imports/2026-02/20260214.bai', await readFixture('20260114.bai'));

        expect(await processMonth('2026-02', options())).toBe(0);

        const transactions = await readFile(join(root, 'outputs', '2026-02', 'transactions.csv'), 'utf-8');
        expect(transactions.split('\n')).toHaveLength(2);
        const log = RunLogSchema.parse(JSON.parse(await readFile(join(root, 'outputs', 'run_log.json'), 'utf-8')));
        expect(log[0]).toMatchObject({ month: '2026-02', transaction_rows: 0, balance_rows: 2 });
    });

    it('writes nothing on a dry run', async () => {
        expect(await processMonth('2026-01', { ...options(), dryRun: true })).toBe(0);

        expect(await exists(join(root, 'outputs'))).toBe(false);
        expect(await exists(join(root, 'imports', '2026-01', '20260114.bai'))).toBe(true);
    });

    it('fails without a workspace config', async () => {
        expect(await processMonth('2026-01', { ...options(), workspace: join(root, 'imports') })).toBe(1);
    });
});

describe('validateMonth', () => {
    it('accepts YYYY-MM', () => {
        expect(validateMonth('2026-01')).toBeNull();
    });

    it('rejects other formats and months', () => {
        expect(validateMonth('2026-1')).toBe('Invalid month format. Use YYYY-MM (e.g., 2026-01).');
        expect(validateMonth('2026-13')).toBe('Invalid month "13". Must be between 01 and 12.');
    });
});

describe('run', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints usage with no arguments', async () => {
        expect(await run([])).toBe(0);
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('cash-recon process <YYYY-MM>'));
    });

    it('rejects an unknown command', async () => {
        expect(await run(['reconcile'])).toBe(1);
    });

    it('requires a month for process', async () => {
        expect(await run(['process'])).toBe(1);
    });
});
