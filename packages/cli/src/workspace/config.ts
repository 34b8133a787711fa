import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import {
    InvoiceListSchema,
    ReconConfigSchema,
    type Invoice,
    type ReconConfig,
} from '@cash-recon/shared';
import type { Workspace } from '../types.js';

/**
 * Loads and validates config/recon.yaml.
 * An empty file yields the defaults.
 */
export function loadConfig(workspace: Workspace): ReconConfig {
    const path = workspace.configPath;
    if (!existsSync(path)) {
        throw new Error(`Config file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    return ReconConfigSchema.parse(data ?? {});
}

/**
 * Loads the open invoice list.
 * Accepts a bare array or `{ invoices: [...] }`.
 *
 * @returns null when the file does not exist
 */
export function loadInvoices(path: string): Invoice[] | null {
    if (!existsSync(path)) {
        return null;
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = JSON.parse(content);
    return InvoiceListSchema.parse(data);
}
