import Decimal from 'decimal.js';
import type { Invoice, MatchConfig } from '../types/index.js';
import type { InvoiceScore } from './types.js';
import { nameSimilarity } from './name-similarity.js';
import { parseDisplayAmount } from '../utils/amount.js';

/**
 * Invoice remaining amount as a Decimal; unparseable amounts become 0
 * and so never score on amount.
 */
export function invoiceAmount(invoice: Invoice): Decimal {
    return parseDisplayAmount(invoice.amount_remaining) ?? new Decimal(0);
}

/**
 * Amount component.
 * Exact (difference below the absolute tolerance) or close (difference
 * within the relative tolerance of the larger amount).
 */
export function amountScore(txnAmount: Decimal, invAmount: Decimal, config: MatchConfig): number {
    if (txnAmount.lessThanOrEqualTo(0) || invAmount.lessThanOrEqualTo(0)) {
        return 0;
    }

    const diff = txnAmount.minus(invAmount).abs();
    if (diff.lessThan(config.amountExactTolerance)) {
        return config.amountExactPoints;
    }

    const larger = Decimal.max(txnAmount, invAmount);
    if (diff.dividedBy(larger).lessThanOrEqualTo(config.amountCloseRatio)) {
        return config.amountClosePoints;
    }

    return 0;
}

/**
 * Name component: token-set similarity scaled onto 0..nameMaxPoints.
 */
export function nameScore(memo: string, customerName: string, config: MatchConfig): number {
    if (!memo || !customerName) {
        return 0;
    }
    return Math.round((nameSimilarity(memo, customerName) * config.nameMaxPoints) / 100);
}

/**
 * Score one invoice against a credit transaction.
 */
export function scoreInvoice(
    txnAmount: Decimal,
    memo: string,
    invoice: Invoice,
    config: MatchConfig
): InvoiceScore {
    const amount = amountScore(txnAmount, invoiceAmount(invoice), config);
    const name = nameScore(memo, invoice.customer_name, config);
    return { amount, name, total: amount + name };
}
