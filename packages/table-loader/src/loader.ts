/**
 * Turns raw table rows into validated, immutable records.
 *
 * Validation never stops at the first bad row: every row is checked and all
 * issues are returned together so a whole batch can be fixed in one pass.
 */

import type { z } from 'zod';
import { HEADER_ROW_NUMBER, type Declaration, type RowIssue, type Transaction } from '@giftaid/core';
import {
  declarationRowSchema,
  transactionRowSchema,
  type DeclarationRowOutput,
  type TransactionRowOutput,
} from './row-schemas.js';
import { DECLARATIONS_TABLE, TRANSACTIONS_TABLE, type TableSpec } from './table-spec.js';

/** One data row of an input table */
export interface TableRow {
  /** Spreadsheet row number (header is row 1) */
  rowNumber: number;
  cells: readonly string[];
}

export type LoadResult<T> =
  | { ok: true; records: T[] }
  | { ok: false; issues: RowIssue[] };

/**
 * Number plain cell arrays the way a spreadsheet would, starting below the header
 */
export function toTableRows(rows: readonly (readonly string[])[]): TableRow[] {
  return rows.map((cells, index) => ({ rowNumber: HEADER_ROW_NUMBER + index + 1, cells }));
}

function loadRows<TOutput, TRecord>(
  spec: TableSpec,
  rows: readonly TableRow[],
  schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
  build: (row: TableRow, values: TOutput) => TRecord
): LoadResult<TRecord> {
  const records: TRecord[] = [];
  const issues: RowIssue[] = [];

  for (const row of rows) {
    if (row.cells.length !== spec.columns.length) {
      issues.push({
        table: spec.name,
        rowNumber: row.rowNumber,
        column: 0,
        columnName: '(row)',
        value: row.cells.join(', '),
        message: `Row has ${row.cells.length} columns`,
        expected: `${spec.columns.length} columns: ${spec.columns.map((c) => c.header).join(', ')}`,
      });
      continue;
    }

    const input: Record<string, string> = {};
    spec.columns.forEach((column, index) => {
      input[column.key] = row.cells[index] ?? '';
    });

    const result = schema.safeParse(input);
    if (result.success) {
      records.push(build(row, result.data));
      continue;
    }

    for (const zodIssue of result.error.issues) {
      const key = String(zodIssue.path[0] ?? '');
      const columnIndex = spec.columns.findIndex((c) => c.key === key);
      const column = spec.columns[columnIndex];
      issues.push({
        table: spec.name,
        rowNumber: row.rowNumber,
        column: columnIndex + 1,
        columnName: column?.header ?? '(row)',
        value: row.cells[columnIndex],
        message: zodIssue.message,
        expected: column?.expected,
      });
    }
  }

  return issues.length > 0 ? { ok: false, issues } : { ok: true, records };
}

function buildDeclaration(row: TableRow, values: DeclarationRowOutput): Declaration {
  return Object.freeze({
    rowNumber: row.rowNumber,
    title: values.title,
    firstName: values.firstName,
    lastName: values.lastName,
    houseNameOrNumber: values.houseNameOrNumber,
    postcode: values.postcode,
    declarationDate: Object.freeze(values.declarationDate),
    validity: Object.freeze({
      fourYearsBefore: values.fourYearsBefore,
      dayOfDeclaration: values.dayOfDeclaration,
      afterDayOfDeclaration: values.afterDayOfDeclaration,
    }),
    identifier: values.identifier,
  });
}

function buildTransaction(row: TableRow, values: TransactionRowOutput): Transaction {
  return Object.freeze({
    rowNumber: row.rowNumber,
    date: Object.freeze(values.date),
    reference: values.reference,
    amount: Object.freeze(values.amount),
  });
}

export function loadDeclarations(rows: readonly TableRow[]): LoadResult<Declaration> {
  return loadRows(DECLARATIONS_TABLE, rows, declarationRowSchema, buildDeclaration);
}

export function loadTransactions(rows: readonly TableRow[]): LoadResult<Transaction> {
  return loadRows(TRANSACTIONS_TABLE, rows, transactionRowSchema, buildTransaction);
}
