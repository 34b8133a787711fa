import { matchInvoices } from '@cash-recon/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 6: Invoice Matching
 * Scores every credit row against the open invoices. Debit rows pass
 * through with empty match columns.
 */
export const matchTransactions: PipelineStep = async (state) => {
    const result = matchInvoices(state.transactionRows, state.invoices, {
        config: state.config.matching,
        invoiceUrlTemplate: state.config.invoice_url_template,
    });

    state.matchResult = result;
    state.warnings.push(...result.warnings);

    return state;
};
