/**
 * @giftaid/table-loader
 *
 * Reads and validates the transactions and declarations tables
 */

export { readTable, parseCsv, toTableContents } from './table-reader.js';
export type { TableContents, TableFile } from './table-reader.js';

export { loadDeclarations, loadTransactions, toTableRows } from './loader.js';
export type { LoadResult, TableRow } from './loader.js';

export { declarationRowSchema, transactionRowSchema } from './row-schemas.js';

export { DECLARATIONS_TABLE, TRANSACTIONS_TABLE } from './table-spec.js';
export type { ColumnSpec, TableSpec } from './table-spec.js';
