/**
 * BAI2 date formatting.
 * BAI2 writes dates as YYMMDD; some banks send YYYYMMDD.
 */

/** Two-digit years below this belong to the 2000s. */
const TWO_DIGIT_YEAR_PIVOT = 69;

/**
 * Build a UTC date, or null when the parts do not form a real calendar day.
 */
function toUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/**
 * Parse a BAI2 date (YYMMDD or YYYYMMDD) to a UTC Date.
 */
export function parseBaiDate(raw: string): Date | null {
    const value = raw.trim();
    let match = value.match(/^(\d{2})(\d{2})(\d{2})$/);
    if (match) {
        const yy = parseInt(match[1], 10);
        const year = yy < TWO_DIGIT_YEAR_PIVOT ? 2000 + yy : 1900 + yy;
        return toUtcDate(year, parseInt(match[2], 10), parseInt(match[3], 10));
    }
    match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
    if (match) {
        return toUtcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
    }
    return null;
}

/**
 * Format a BAI2 date as M/D/YYYY (no leading zeros).
 * "260115" -> "1/15/2026". Anything else passes through unchanged.
 */
export function formatBaiDate(raw: string): string {
    const date = parseBaiDate(raw);
    if (!date) return raw;
    return `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${date.getUTCFullYear()}`;
}
