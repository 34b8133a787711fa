export { isCreditTypeCode, isDebitTypeCode, typeCodeLabel } from './type-code.js';
export { formatMinorUnits, formatWithSeparators, parseDisplayAmount } from './amount.js';
export { formatBaiDate, parseBaiDate } from './date-format.js';
export { normalizeName, nameTokens } from './normalize.js';
export { generateRowKey, dedupeRows } from './row-key.js';
export type { DedupeResult } from './row-key.js';
