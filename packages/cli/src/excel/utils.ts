import exceljs from 'exceljs';
import type { CellValue, Worksheet, Workbook } from 'exceljs';
import { parseDisplayAmount } from '@cash-recon/core';
import type { Column } from '../export/columns.js';

const HEADER_FILL = 'FF4472C4';
const CURRENCY_FORMAT = '#,##0.00;[Red]-#,##0.00';
const MAX_COLUMN_WIDTH = 100;

export type SheetRow = Record<string, CellValue>;

export interface SheetOptions {
    /** Column keys holding amounts, formatted as currency and right-aligned. */
    currencyKeys?: readonly string[];
}

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Cash Recon';
    workbook.created = new Date();
    return workbook;
}

/**
 * Adds a worksheet laid out by `columns`: styled and frozen header row,
 * filter on the header, one row per entry, widths fitted to content.
 */
export function addSheet<T>(
    workbook: Workbook,
    name: string,
    columns: readonly Column<T>[],
    rows: readonly SheetRow[],
    options: SheetOptions = {}
): Worksheet {
    const sheet = workbook.addWorksheet(name);
    sheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
    sheet.columns = columns.map(c => ({ header: c.header, key: c.key }));
    sheet.addRows([...rows]);

    formatHeaderRow(sheet);
    for (const key of options.currencyKeys ?? []) {
        const column = sheet.getColumn(key);
        column.numFmt = CURRENCY_FORMAT;
        column.alignment = { horizontal: 'right' };
    }
    if (columns.length > 0) {
        sheet.autoFilter = { from: { row: 1, column: 1 }, to: { row: 1, column: columns.length } };
    }
    autoFitColumns(sheet);

    return sheet;
}

function formatHeaderRow(sheet: Worksheet): void {
    const headerRow = sheet.getRow(1);
    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    headerRow.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };
}

function autoFitColumns(sheet: Worksheet): void {
    sheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            maxLen = Math.max(maxLen, cell.text.length);
        });
        column.width = Math.min(maxLen + 2, MAX_COLUMN_WIDTH);
    });
}

/**
 * Display amount ("1,500.00") as a number cell; anything else stays text.
 */
export function amountCell(value: string): CellValue {
    const amount = parseDisplayAmount(value);
    return amount === null ? value : amount.toNumber();
}

/**
 * A "=HYPERLINK(...)" string as a live formula cell.
 */
export function formulaCell(value: string, result: string): CellValue {
    return value.startsWith('=') ? { formula: value.slice(1), result, date1904: false } : value;
}
