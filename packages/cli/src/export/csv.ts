import * as XLSX from 'xlsx';
import type { Column } from './columns.js';

/**
 * Renders rows as CSV with a header line, columns in the given order.
 * Values are written as text; SheetJS handles quoting.
 */
export function rowsToCsv<T>(rows: readonly T[], columns: readonly Column<T>[]): string {
    const table: string[][] = [
        columns.map(c => c.header),
        ...rows.map(row => columns.map(c => String(row[c.key]))),
    ];
    const sheet = XLSX.utils.aoa_to_sheet(table);
    return `${XLSX.utils.sheet_to_csv(sheet).replace(/\n$/, '')}\n`;
}
