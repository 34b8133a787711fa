/**
 * Text normalization for name matching.
 *
 * Transformations:
 * - Convert to uppercase
 * - Collapse runs of whitespace to a single space
 * - Trim leading/trailing whitespace
 *
 * Punctuation is kept: "ACME-CORP" is one word, not two.
 */
export function normalizeName(raw: string): string {
    return raw
        .toUpperCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Distinct whitespace-separated words of a normalized name, in first-seen order.
 */
export function nameTokens(raw: string): string[] {
    const normalized = normalizeName(raw);
    if (normalized === '') return [];
    return [...new Set(normalized.split(' '))];
}
