export {
  parseUkDate,
  compareDates,
  subtractYears,
  formatIsoDate,
  formatUkDate,
  toUtcDate,
} from './dates.js';
export { parseAmount, formatMoney, sumMoney, toPounds } from './money.js';
export type { AmountParseResult } from './money.js';
export { UK_POSTCODE_PATTERN, isValidPostcode, suggestPostcode } from './postcode.js';
export { normalizeKey, REFERENCE_NORMALIZATIONS } from './reference.js';
export type { ReferenceNormalization } from './reference.js';
