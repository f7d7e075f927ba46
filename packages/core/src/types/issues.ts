/**
 * Row-level validation issues reported by the table loader
 */

export type TableName = 'transactions' | 'declarations';

export interface RowIssue {
  /** Table the row belongs to */
  table: TableName;
  /** Spreadsheet row number (header is row 1) */
  rowNumber: number;
  /** 1-based column number, or 0 when the issue concerns the whole row */
  column: number;
  /** Header of the column, or "(row)" for whole-row issues */
  columnName: string;
  /** The offending cell value as read */
  value?: string;
  message: string;
  /** Description of what the column should contain */
  expected?: string;
}
