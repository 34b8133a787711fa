/**
 * Message of a caught value, for reporting.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Node system error code (ENOENT, EXDEV, ...), if any.
 */
export function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
