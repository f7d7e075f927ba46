export type { Money } from './money.js';
export type { CalendarDate } from './calendar-date.js';
export type { Declaration, ValidityWindows } from './declaration.js';
export { donorName, describeDeclaration } from './declaration.js';
export type { Transaction } from './transaction.js';
export type { TableName, RowIssue } from './issues.js';
