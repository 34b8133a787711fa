import type {
    BalanceRow,
    Invoice,
    InvoiceMatchResult,
    ReconConfig,
    TransactionDetailRow,
    TransactionRow,
} from '@cash-recon/shared';
import type { Workspace, ProcessOptions } from '../types.js';

/**
 * Metadata for an input file discovered in the imports directory.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
}

/**
 * Rows decoded from one file. Transaction and detail rows are parallel.
 */
export interface FileRows {
    balanceRows: BalanceRow[];
    transactionRows: TransactionRow[];
    detailRows: TransactionDetailRow[];
    skippedLines: number;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

export interface PipelineStatistics {
    rawTransactionCount: number;
    duplicateCount: number;
    previouslyProcessedCount: number;
}

/**
 * Central state object passed through the processing pipeline.
 */
export interface PipelineState {
    month: string;
    workspace: Workspace;
    config: ReconConfig;
    options: ProcessOptions;

    // Accumulated during pipeline execution
    files: InputFile[];
    parseResults: Record<string, FileRows>;
    balanceRows: BalanceRow[];
    transactionRows: TransactionRow[];
    detailRows: TransactionDetailRow[];
    rowKeys: string[];
    invoices: Invoice[];
    matchResult?: InvoiceMatchResult;

    warnings: string[];
    errors: PipelineError[];
    statistics: PipelineStatistics;
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
