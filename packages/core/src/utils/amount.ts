import Decimal from 'decimal.js';

/**
 * Format a BAI2 amount (integer string in cents) for display.
 * "150000" -> "1,500.00". Values that are not integers pass through unchanged.
 */
export function formatMinorUnits(amount: string): string {
    const trimmed = amount.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
        return amount;
    }
    return formatWithSeparators(new Decimal(trimmed).dividedBy(100));
}

/**
 * Render a Decimal with thousands separators and two decimal places.
 */
export function formatWithSeparators(value: Decimal): string {
    const fixed = value.abs().toFixed(2);
    const [whole, fraction] = fixed.split('.');
    const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
    return `${value.isNegative() && !value.isZero() ? '-' : ''}${grouped}.${fraction}`;
}

/**
 * Parse a display amount such as "1,500.00" back to a Decimal.
 * Returns null for empty or unparseable values.
 */
export function parseDisplayAmount(value: string | undefined): Decimal | null {
    const clean = (value ?? '').replace(/,/g, '').trim();
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(clean)) {
        return null;
    }
    return new Decimal(clean);
}
