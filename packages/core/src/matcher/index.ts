/**
 * Matcher module: credit transactions to open receivables invoices.
 */

export { matchInvoices } from './match-invoices.js';
export { findBestInvoice } from './find-best-invoice.js';
export { amountScore, nameScore, scoreInvoice, invoiceAmount } from './score.js';
export { nameSimilarity, indelRatio } from './name-similarity.js';
export { buildInvoiceUrl, resolveInvoiceUrl, hyperlinkFormula } from './invoice-url.js';
export type { InvoiceMatcherOptions, InvoiceScore, InvoiceCandidate, BestInvoiceResult } from './types.js';
