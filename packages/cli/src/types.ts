/**
 * Cash Recon CLI - Core Types
 */

export interface ProcessOptions {
    dryRun: boolean;
    force: boolean;
    yes: boolean;
    workspace?: string;
}

/** `parse` output selection; transactions when neither is set. */
export interface ParseOptions {
    balances: boolean;
    details: boolean;
}

/**
 * Absolute paths of a workspace. Month folders live under imports,
 * outputs and archive.
 */
export interface Workspace {
    root: string;
    imports: string;
    outputs: string;
    archive: string;
    configPath: string;
    runLogPath: string;
}
