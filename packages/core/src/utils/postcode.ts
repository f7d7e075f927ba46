import { NON_UK_POSTCODE } from '../constants.js';

/** Outward code, one space, inward code. Girobank's GIR 0AA is not accepted. */
export const UK_POSTCODE_PATTERN = /^[A-Z]{1,2}\d{1,2}[A-Z]? \d[A-Z]{2}$/;

export function isValidPostcode(postcode: string): boolean {
  return postcode === NON_UK_POSTCODE || UK_POSTCODE_PATTERN.test(postcode);
}

/**
 * Best guess at the intended postcode for a malformed one, e.g. "sw1a1aa" -> "SW1A 1AA".
 * Returns null when no valid postcode can be derived or the input is already valid.
 */
export function suggestPostcode(raw: string): string | null {
  let postcode = raw.toUpperCase().trim();
  if (postcode === NON_UK_POSTCODE) {
    return raw.trim() === NON_UK_POSTCODE ? null : NON_UK_POSTCODE;
  }

  postcode = postcode
    .replace(/^[^A-Z]+/, '')
    .replace(/[^A-Z]+$/, '')
    .replace(/[^A-Z\d]/g, '');
  if (postcode.length > 2) {
    postcode = `${postcode.slice(0, -3)} ${postcode.slice(-3)}`;
  }

  if (postcode === raw.trim() || !UK_POSTCODE_PATTERN.test(postcode)) {
    return null;
  }
  return postcode;
}
