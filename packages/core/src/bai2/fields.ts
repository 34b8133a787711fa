/**
 * Field extraction by fixed position.
 *
 * BAI2 records are positional. A layout maps each named field to its index
 * in the split record; positions past the end of the record become ''.
 */

export type FieldLayout<K extends string> = Readonly<Record<K, number>>;

/**
 * Field at `index`, or '' when the record is shorter.
 */
export function fieldAt(fields: readonly string[], index: number): string {
    return index < fields.length ? fields[index] : '';
}

/**
 * Build a typed record from a field list and a layout.
 */
export function extractFields<K extends string>(
    fields: readonly string[],
    layout: FieldLayout<K>
): Record<K, string> {
    const entries = Object.entries<number>(layout).map(
        ([name, index]) => [name, fieldAt(fields, index)] as const
    );
    return Object.fromEntries(entries) as Record<K, string>;
}

// Record layouts. Index 0 is the record tag.

export const FILE_HEADER_LAYOUT = {
    sender_id: 1,
    receiver_id: 2,
    file_creation_date: 3,
    file_creation_time: 4,
    resend_indicator: 5,
    record_size: 6,
    blocking_factor: 7,
    version_number: 8,
} as const satisfies FieldLayout<string>;

export const GROUP_HEADER_LAYOUT = {
    ultimate_receiver_id: 1,
    originator_id: 2,
    group_status: 3,
    as_of_date: 4,
    as_of_time: 5,
    currency_code: 6,
    as_of_date_modifier: 7,
} as const satisfies FieldLayout<string>;

export const ACCOUNT_HEADER_LAYOUT = {
    customer_account: 1,
    currency_code: 2,
} as const satisfies FieldLayout<string>;

/** First index of the repeating balance quadruples on an account header. */
export const ACCOUNT_BALANCES_START = 3;

export const BALANCE_LAYOUT = {
    type_code: 0,
    amount: 1,
    item_count: 2,
    funds_type: 3,
} as const satisfies FieldLayout<string>;

export const TRANSACTION_LAYOUT = {
    type_code: 1,
    amount: 2,
    funds_type: 3,
    bank_ref: 4,
    customer_ref: 5,
} as const satisfies FieldLayout<string>;

/** The free-text field runs from here to the end of the record. */
export const TRANSACTION_TEXT_START = 6;

export const TRAILER_LAYOUT = {
    control_total: 1,
    record_count: 2,
} as const satisfies FieldLayout<string>;
