/**
 * Column layouts of the two input tables
 */

import type { TableName } from '@giftaid/core';

export interface ColumnSpec<TKey extends string = string> {
  /** Header text as it appears in the template tables */
  header: string;
  /** Field name used by the row schema */
  key: TKey;
  /** What a valid cell looks like, shown next to validation issues */
  expected?: string;
}

export interface TableSpec<TKey extends string = string> {
  name: TableName;
  /** Default file name inside the input directory */
  fileName: string;
  columns: readonly ColumnSpec<TKey>[];
}

const DATE_EXPECTED = 'a date written as dd/mm/yy (or dd/mm/yyyy)';
const FLAG_EXPECTED = '"1" if the declaration covers this period, "0" if it does not';

export const DECLARATIONS_TABLE = {
  name: 'declarations',
  fileName: 'declarations.csv',
  columns: [
    { header: 'Title', key: 'title', expected: 'at most four characters, e.g. "Mrs"' },
    { header: 'First Name', key: 'firstName', expected: 'between 1 and 35 characters' },
    { header: 'Last Name', key: 'lastName', expected: 'between 1 and 35 characters, no hyphens' },
    { header: 'House Number or Name', key: 'houseNameOrNumber', expected: 'between 1 and 40 characters' },
    { header: 'Postcode', key: 'postcode', expected: 'a UK postcode in capitals with one space, e.g. "SW1A 1AA", or "X" for donors outside the UK' },
    { header: 'Date', key: 'declarationDate', expected: DATE_EXPECTED },
    { header: 'Valid Four Years Before Day of Declaration', key: 'fourYearsBefore', expected: FLAG_EXPECTED },
    { header: 'Valid Day of Declaration', key: 'dayOfDeclaration', expected: FLAG_EXPECTED },
    { header: 'Valid After Day of Declaration', key: 'afterDayOfDeclaration', expected: FLAG_EXPECTED },
    { header: 'Identifier', key: 'identifier', expected: 'the text that appears in this donor\'s bank references' },
  ],
} as const satisfies TableSpec;

export const TRANSACTIONS_TABLE = {
  name: 'transactions',
  fileName: 'transactions.csv',
  columns: [
    { header: 'Date', key: 'date', expected: DATE_EXPECTED },
    { header: 'Reference', key: 'reference' },
    { header: 'Amount', key: 'amount', expected: 'a positive amount with at most two decimal places, e.g. "12.50"' },
  ],
} as const satisfies TableSpec;

export type DeclarationColumnKey = (typeof DECLARATIONS_TABLE.columns)[number]['key'];
export type TransactionColumnKey = (typeof TRANSACTIONS_TABLE.columns)[number]['key'];
