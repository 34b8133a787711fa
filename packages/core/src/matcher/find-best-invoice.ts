import type Decimal from 'decimal.js';
import type { Invoice, MatchConfig } from '../types/index.js';
import type { BestInvoiceResult, InvoiceCandidate } from './types.js';
import { invoiceAmount, scoreInvoice } from './score.js';

/**
 * Find the best invoice for one credit transaction.
 *
 * Exhaustive scan: every invoice is scored. The strictly highest total
 * wins; on an exact tie the invoice whose remaining amount is closer to the
 * transaction wins; equal distance keeps the earlier invoice. The winner is
 * accepted only at config.minScore or above.
 */
export function findBestInvoice(
    txnAmount: Decimal,
    memo: string,
    invoices: readonly Invoice[],
    config: MatchConfig
): BestInvoiceResult {
    let best: InvoiceCandidate | null = null;

    for (const invoice of invoices) {
        const score = scoreInvoice(txnAmount, memo, invoice, config);
        const amountDiff = txnAmount.minus(invoiceAmount(invoice)).abs();

        if (best === null) {
            if (score.total > 0) {
                best = { invoice, score, amountDiff };
            }
        } else if (score.total > best.score.total) {
            best = { invoice, score, amountDiff };
        } else if (score.total === best.score.total && amountDiff.lessThan(best.amountDiff)) {
            best = { invoice, score, amountDiff };
        }
    }

    if (best === null) {
        return { match: null, candidate: null, reason: 'no_candidates' };
    }

    if (best.score.total < config.minScore) {
        return { match: null, candidate: best, reason: 'below_threshold' };
    }

    return { match: best.invoice, candidate: best, reason: 'matched' };
}
