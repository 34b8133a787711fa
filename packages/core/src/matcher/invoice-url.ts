import type { Invoice } from '../types/index.js';

const ID_PLACEHOLDER = '{id}';

/**
 * Fill the {id} placeholder of an invoice URL template.
 */
export function buildInvoiceUrl(template: string, id: string): string {
    return template.split(ID_PLACEHOLDER).join(encodeURIComponent(id));
}

/**
 * URL for an invoice: its own, else the template, else ''.
 */
export function resolveInvoiceUrl(invoice: Invoice, template?: string): string {
    if (invoice.url) return invoice.url;
    if (template) return buildInvoiceUrl(template, invoice.id);
    return '';
}

/**
 * Spreadsheet hyperlink formula. Quotes inside the URL or label are doubled.
 */
export function hyperlinkFormula(url: string, label: string): string {
    const escape = (value: string) => value.replace(/"/g, '""');
    return `=HYPERLINK("${escape(url)}","${escape(label)}")`;
}
