import type { Declaration, Transaction } from '@giftaid/core';

let nextDeclarationRow = 2;
let nextTransactionRow = 2;

export function makeDeclaration(overrides: Partial<Declaration> = {}): Declaration {
  return {
    rowNumber: nextDeclarationRow++,
    title: 'Mr',
    firstName: 'John',
    lastName: 'Smith',
    houseNameOrNumber: '12',
    postcode: 'M1 1AE',
    declarationDate: { year: 2020, month: 6, day: 1 },
    validity: { fourYearsBefore: true, dayOfDeclaration: true, afterDayOfDeclaration: true },
    identifier: 'FP John Smith Giving',
    ...overrides,
  };
}

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    rowNumber: nextTransactionRow++,
    date: { year: 2024, month: 1, day: 5 },
    reference: 'FP John Smith Giving Jan 2024',
    amount: { pence: 12300 },
    ...overrides,
  };
}
