/**
 * Declaration validity windows.
 *
 * A declaration says whether it covers donations made in the four years
 * before it was signed, on the day it was signed, and after that day.
 * Donations older than four years before the declaration are never covered.
 */

import {
  compareDates,
  formatIsoDate,
  subtractYears,
  type Declaration,
  type Transaction,
} from '@giftaid/core';

export type EligibilityVerdict =
  | 'eligible'
  | 'before-four-year-window'
  | 'not-valid-four-years-before'
  | 'not-valid-on-day-of-declaration'
  | 'not-valid-after-day-of-declaration';

export interface Eligibility {
  verdict: EligibilityVerdict;
  /** Explanation for an ineligible verdict */
  reason?: string;
}

export function checkEligibility(
  transaction: Transaction,
  declaration: Declaration
): Eligibility {
  const transactionDate = transaction.date;
  const declarationDate = declaration.declarationDate;
  const windowStart = subtractYears(declarationDate, 4);
  const declared = formatIsoDate(declarationDate);
  const donated = formatIsoDate(transactionDate);
  const relative = compareDates(transactionDate, declarationDate);

  if (compareDates(transactionDate, windowStart) < 0) {
    return {
      verdict: 'before-four-year-window',
      reason: `transaction occurred more than four years before declaration date of ${declared}`,
    };
  }
  if (relative < 0 && !declaration.validity.fourYearsBefore) {
    return {
      verdict: 'not-valid-four-years-before',
      reason:
        'transaction occurred less than four years before declaration date, but declaration ' +
        "wasn't stated to cover donations made in the four years before it was signed " +
        `(declaration date: ${declared}, transaction date: ${donated})`,
    };
  }
  if (relative === 0 && !declaration.validity.dayOfDeclaration) {
    return {
      verdict: 'not-valid-on-day-of-declaration',
      reason:
        "transaction occurred on declaration date, but declaration wasn't stated to cover " +
        `donations made on the day it was signed (declaration/transaction date: ${declared})`,
    };
  }
  if (relative > 0 && !declaration.validity.afterDayOfDeclaration) {
    return {
      verdict: 'not-valid-after-day-of-declaration',
      reason:
        "transaction occurred after declaration date, but declaration wasn't stated to cover " +
        'donations made after the day it was signed ' +
        `(declaration date: ${declared}, transaction date: ${donated})`,
    };
  }
  return { verdict: 'eligible' };
}
