/**
 * Zod schemas for the cash reconciliation engine.
 *
 * IMPORTANT: Money is carried as strings. Row amounts are display strings
 * ("1,500.00"), invoice amounts are plain decimal strings ("1500.00").
 * Convert to Decimal at computation boundaries only.
 */

import { z } from 'zod';
import { MATCHING_CONFIG, EXPORT_DEFAULTS, ROW_KEY } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Plain decimal string, no thousands separators.
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Month of processing: YYYY-MM.
 */
const monthString = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Must be YYYY-MM format');

/**
 * Row key: 16-char hex.
 */
const rowKey = z.string().regex(
    new RegExp(`^[0-9a-f]{${ROW_KEY.LENGTH}}$`),
    `Must be ${ROW_KEY.LENGTH}-char hex`
);

// ============================================================================
// Export Row Schemas
// ============================================================================

/**
 * Compact transaction row: the transaction plus the context it inherits,
 * with derived type label, formatted date and split credit/debit amounts.
 * Every field is present on every row, empty when not applicable.
 */
export const TransactionRowSchema = z.object({
    date: z.string(),
    bank_id: z.string(),
    account_number: z.string(),
    account_title: z.string(),
    entity: z.string(),
    tran_type: z.string(),
    bai_type_code: z.string(),
    currency: z.string(),
    credit_amount: z.string(),
    debit_amount: z.string(),
    bank_ref: z.string(),
    end_to_end_id: z.string(),
    customer_ref: z.string(),
    description: z.string(),
    reason_for_payment: z.string(),
    notes: z.string(),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

/**
 * Fully denormalized transaction row: every ancestor field, raw values.
 */
export const TransactionDetailRowSchema = z.object({
    file_sender_id: z.string(),
    file_receiver_id: z.string(),
    file_creation_date: z.string(),
    file_creation_time: z.string(),
    group_originator_id: z.string(),
    group_receiver_id: z.string(),
    group_status: z.string(),
    as_of_date: z.string(),
    as_of_time: z.string(),
    as_of_date_modifier: z.string(),
    currency_code: z.string(),
    customer_account: z.string(),
    type_code: z.string(),
    amount: z.string(),
    funds_type: z.string(),
    bank_ref: z.string(),
    customer_ref: z.string(),
    text: z.string(),
    account_control_total: z.string(),
    account_record_count: z.string(),
    group_control_total: z.string(),
    group_record_count: z.string(),
    file_control_total: z.string(),
    file_record_count: z.string(),
});

export type TransactionDetailRow = z.infer<typeof TransactionDetailRowSchema>;

/**
 * Fully denormalized balance row, one per balance entry on an account header.
 */
export const BalanceRowSchema = z.object({
    file_sender_id: z.string(),
    file_receiver_id: z.string(),
    file_creation_date: z.string(),
    file_creation_time: z.string(),
    resend_indicator: z.string(),
    group_originator_id: z.string(),
    group_receiver_id: z.string(),
    group_status: z.string(),
    as_of_date: z.string(),
    as_of_time: z.string(),
    as_of_date_modifier: z.string(),
    currency_code: z.string(),
    customer_account: z.string(),
    balance_type_code: z.string(),
    balance_amount: z.string(),
    balance_item_count: z.string(),
    balance_funds_type: z.string(),
    account_control_total: z.string(),
    account_record_count: z.string(),
    group_control_total: z.string(),
    group_record_count: z.string(),
    file_control_total: z.string(),
    file_record_count: z.string(),
});

export type BalanceRow = z.infer<typeof BalanceRowSchema>;

/**
 * Transaction row with the four invoice match columns appended.
 */
export const MatchedTransactionRowSchema = TransactionRowSchema.extend({
    matched_customer: z.string(),
    invoice_number: z.string(),
    confidence: z.string(),
    invoice_link: z.string(),
});

export type MatchedTransactionRow = z.infer<typeof MatchedTransactionRowSchema>;

// ============================================================================
// Invoice Schemas
// ============================================================================

/**
 * Open receivables invoice as returned by the invoice service.
 * The service may send the remaining amount as a number or a string.
 */
export const InvoiceSchema = z.object({
    id: z.union([z.string().min(1), z.number().int()]).transform(v => String(v)),
    number: z.string(),
    customer_name: z.string(),
    amount_remaining: z
        .union([z.number().finite(), decimalString])
        .transform(v => (typeof v === 'number' ? String(v) : v)),
    currency: z.string().default(''),
    due_date: z.string().default(''),
    url: z.string().url().optional(),
});

export type Invoice = z.infer<typeof InvoiceSchema>;

/**
 * Invoice list file: either a bare array or `{ invoices: [...] }`.
 */
export const InvoiceListSchema = z.union([
    z.array(InvoiceSchema),
    z.object({ invoices: z.array(InvoiceSchema) }).transform(v => v.invoices),
]);

// ============================================================================
// Matching Schemas
// ============================================================================

/**
 * Configuration for invoice matching.
 */
export const MatchConfigSchema = z.object({
    amountExactPoints: z.number().int().min(0).default(MATCHING_CONFIG.AMOUNT_EXACT_POINTS),
    amountClosePoints: z.number().int().min(0).default(MATCHING_CONFIG.AMOUNT_CLOSE_POINTS),
    amountExactTolerance: decimalString.default(MATCHING_CONFIG.AMOUNT_EXACT_TOLERANCE),
    amountCloseRatio: decimalString.default(MATCHING_CONFIG.AMOUNT_CLOSE_RATIO),
    nameMaxPoints: z.number().int().min(0).default(MATCHING_CONFIG.NAME_MAX_POINTS),
    minScore: z.number().int().min(0).max(MATCHING_CONFIG.MAX_SCORE).default(MATCHING_CONFIG.MIN_SCORE),
    linkLabel: z.string().default(MATCHING_CONFIG.LINK_LABEL),
});

export type MatchConfig = z.infer<typeof MatchConfigSchema>;

/**
 * Matching statistics for transparency.
 */
export const InvoiceMatchStatsSchema = z.object({
    total_rows: z.number().int().min(0),
    credit_rows: z.number().int().min(0),
    matched: z.number().int().min(0),
    below_threshold: z.number().int().min(0),
    invoices_considered: z.number().int().min(0),
});

export type InvoiceMatchStats = z.infer<typeof InvoiceMatchStatsSchema>;

/**
 * Result of invoice matching. Warnings are data; the core does not log.
 */
export const InvoiceMatchResultSchema = z.object({
    rows: z.array(MatchedTransactionRowSchema),
    stats: InvoiceMatchStatsSchema,
    warnings: z.array(z.string()),
});

export type InvoiceMatchResult = z.infer<typeof InvoiceMatchResultSchema>;

// ============================================================================
// Workspace Configuration
// ============================================================================

/**
 * config/recon.yaml
 */
export const ReconConfigSchema = z.object({
    entity: z.string().default(EXPORT_DEFAULTS.ENTITY),
    account_title: z.string().default(EXPORT_DEFAULTS.ACCOUNT_TITLE),
    invoice_url_template: z
        .string()
        .refine(v => v.includes('{id}'), 'Must contain the {id} placeholder')
        .optional(),
    invoices_file: z.string().min(1).default('invoices/open-invoices.json'),
    matching: MatchConfigSchema.partial().default({}),
});

export type ReconConfig = z.infer<typeof ReconConfigSchema>;

// ============================================================================
// Run Manifest & Run Log
// ============================================================================

/**
 * Run manifest for tracking processed files and matched rows.
 */
export const RunManifestSchema = z.object({
    month: monthString,
    run_timestamp: z.string(),
    input_files: z.record(z.string(), z.string()),
    transaction_count: z.number().int().min(0),
    row_keys: z.array(rowKey),
    matched_row_keys: z.array(rowKey),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;

/**
 * One entry of outputs/run_log.json (newest first).
 */
export const RunLogEntrySchema = z.object({
    started_at: z.string(),
    finished_at: z.string().optional(),
    status: z.enum(['running', 'success', 'error']),
    month: z.string(),
    input_files: z.array(z.string()),
    balance_rows: z.number().int().min(0),
    transaction_rows: z.number().int().min(0),
    invoices_loaded: z.number().int().min(0),
    matches_found: z.number().int().min(0),
    error: z.string().nullable(),
});

export type RunLogEntry = z.infer<typeof RunLogEntrySchema>;

export const RunLogSchema = z.array(RunLogEntrySchema);
