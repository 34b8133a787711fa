import type { Workbook } from 'exceljs';
import type { BalanceRow, MatchedTransactionRow } from '@cash-recon/shared';
import { BALANCE_COLUMNS, MATCHED_COLUMNS } from '../export/columns.js';
import { addSheet, amountCell, createWorkbook, formulaCell, type SheetRow } from './utils.js';

export const CASH_APPLICATION_SHEET = 'Cash Application';
export const BALANCES_SHEET = 'Balances';

/**
 * Cash application workbook: every new transaction with its invoice match,
 * plus the balances reported alongside them.
 */
export async function generateCashApplicationExcel(
    rows: readonly MatchedTransactionRow[],
    balances: readonly BalanceRow[],
    linkLabel: string
): Promise<Workbook> {
    const workbook = createWorkbook();

    const cashRows = rows.map((row): SheetRow => ({
        ...row,
        credit_amount: amountCell(row.credit_amount),
        debit_amount: amountCell(row.debit_amount),
        invoice_link: formulaCell(row.invoice_link, linkLabel),
    }));
    addSheet(workbook, CASH_APPLICATION_SHEET, MATCHED_COLUMNS, cashRows, {
        currencyKeys: ['credit_amount', 'debit_amount'],
    });

    addSheet(workbook, BALANCES_SHEET, BALANCE_COLUMNS, balances.map((b): SheetRow => ({ ...b })));

    return workbook;
}
