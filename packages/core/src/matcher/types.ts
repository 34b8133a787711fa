import type Decimal from 'decimal.js';
import type { Invoice, MatchConfig } from '../types/index.js';

/**
 * Options for matchInvoices function.
 */
export interface InvoiceMatcherOptions {
    config?: Partial<MatchConfig>;
    invoiceUrlTemplate?: string;    // e.g. https://erp.example.com/invoice?id={id}
}

/**
 * Score breakdown for one invoice against one transaction.
 */
export interface InvoiceScore {
    amount: number;
    name: number;
    total: number;
}

/**
 * Internal candidate representation.
 */
export interface InvoiceCandidate {
    invoice: Invoice;
    score: InvoiceScore;
    amountDiff: Decimal;
}

/**
 * Result of findBestInvoice.
 * `candidate` is the top scorer even when it misses the threshold.
 */
export interface BestInvoiceResult {
    match: Invoice | null;
    candidate: InvoiceCandidate | null;
    reason: 'matched' | 'below_threshold' | 'no_candidates';
}
