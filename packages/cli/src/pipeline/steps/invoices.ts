import type { PipelineStep } from '../types.js';
import { loadInvoices } from '../../workspace/config.js';
import { resolveWorkspacePath } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 5: Invoice Loading
 * Reads the open invoice list. A missing list is not fatal: matching runs
 * against no invoices and every row stays unmatched.
 */
export const loadInvoiceList: PipelineStep = async (state) => {
    const path = resolveWorkspacePath(state.workspace, state.config.invoices_file);

    try {
        const invoices = loadInvoices(path);
        if (invoices === null) {
            state.warnings.push(`Invoice list not found at ${path}. Matching against no invoices.`);
            return state;
        }
        state.invoices = invoices;
    } catch (err) {
        state.errors.push({
            step: 'invoices',
            message: `Invalid invoice list ${path}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
