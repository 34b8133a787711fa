import type {
    Invoice,
    InvoiceMatchResult,
    MatchedTransactionRow,
    TransactionRow,
} from '../types/index.js';
import { MATCHING_CONFIG, MatchConfigSchema } from '../types/index.js';
import type { InvoiceMatcherOptions } from './types.js';
import { findBestInvoice } from './find-best-invoice.js';
import { hyperlinkFormula, resolveInvoiceUrl } from './invoice-url.js';
import { parseDisplayAmount } from '../utils/amount.js';

const UNMATCHED = {
    matched_customer: '',
    invoice_number: '',
    confidence: '',
    invoice_link: '',
} as const;

/**
 * Match credit transactions to open invoices.
 *
 * PURE FUNCTION: Does not mutate rows or invoices. Returns one output row per
 * input row, same order, each with the four match columns present (empty
 * when unmatched). Rows without a positive credit amount are never scored.
 *
 * @param rows - Compact transaction rows
 * @param invoices - Open invoices, already fetched
 * @param options - Matcher configuration
 * @returns InvoiceMatchResult with rows, stats, warnings
 */
export function matchInvoices(
    rows: readonly TransactionRow[],
    invoices: readonly Invoice[],
    options: InvoiceMatcherOptions = {}
): InvoiceMatchResult {
    const config = MatchConfigSchema.parse({ ...options.config });
    const warnings: string[] = [];
    const output: MatchedTransactionRow[] = [];
    const missingUrls = new Set<string>();

    let creditRows = 0;
    let matched = 0;
    let belowThreshold = 0;

    for (const row of rows) {
        const txnAmount = parseDisplayAmount(row.credit_amount);

        if (txnAmount === null || txnAmount.lessThanOrEqualTo(0)) {
            output.push({ ...row, ...UNMATCHED });
            continue;
        }
        creditRows++;

        const { match, candidate, reason } = findBestInvoice(txnAmount, row.description, invoices, config);

        if (match && candidate) {
            matched++;
            const url = resolveInvoiceUrl(match, options.invoiceUrlTemplate);
            if (!url) missingUrls.add(match.number);

            output.push({
                ...row,
                matched_customer: match.customer_name,
                invoice_number: match.number,
                confidence: `${Math.min(candidate.score.total, MATCHING_CONFIG.MAX_SCORE)}%`,
                invoice_link: url ? hyperlinkFormula(url, config.linkLabel) : '',
            });
        } else {
            if (reason === 'below_threshold') belowThreshold++;
            output.push({ ...row, ...UNMATCHED });
        }
    }

    if (creditRows > 0 && invoices.length === 0) {
        warnings.push(`No open invoices supplied; ${creditRows} credit rows left unmatched`);
    }
    if (missingUrls.size > 0) {
        warnings.push(`No URL available for matched invoices: ${[...missingUrls].join(', ')}`);
    }

    return {
        rows: output,
        stats: {
            total_rows: rows.length,
            credit_rows: creditRows,
            matched,
            below_threshold: belowThreshold,
            invoices_considered: invoices.length,
        },
        warnings,
    };
}
