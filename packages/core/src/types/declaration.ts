/**
 * Donor declaration types
 */

import type { CalendarDate } from './calendar-date.js';

/**
 * The three periods a declaration may cover, relative to the day it was signed
 */
export interface ValidityWindows {
  /** Covers donations made in the four years before the declaration date */
  readonly fourYearsBefore: boolean;
  /** Covers donations made on the declaration date itself */
  readonly dayOfDeclaration: boolean;
  /** Covers donations made after the declaration date */
  readonly afterDayOfDeclaration: boolean;
}

/**
 * A donor's Gift Aid declaration, loaded from one row of the declarations table
 */
export interface Declaration {
  /** Spreadsheet row number in the declarations table (header is row 1) */
  readonly rowNumber: number;
  readonly title: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly houseNameOrNumber: string;
  /** UK postcode (e.g. "SW1A 1AA") or the non-UK sentinel */
  readonly postcode: string;
  readonly declarationDate: CalendarDate;
  readonly validity: ValidityWindows;
  /** Text that appears in the bank reference of this donor's transactions */
  readonly identifier: string;
}

export function donorName(declaration: Declaration): string {
  return [declaration.title, declaration.firstName, declaration.lastName]
    .filter((part) => part !== '')
    .join(' ');
}

/**
 * Donor name plus the declaration's source row, for diagnostics
 */
export function describeDeclaration(declaration: Declaration): string {
  return `${donorName(declaration)} (declarations row ${declaration.rowNumber})`;
}
