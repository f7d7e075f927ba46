import type { CalendarDate } from './calendar-date.js';
import type { Money } from './money.js';

/**
 * A bank transaction, loaded from one row of the transactions table
 */
export interface Transaction {
  /** Spreadsheet row number in the transactions table (header is row 1) */
  readonly rowNumber: number;
  readonly date: CalendarDate;
  /** Free-text bank reference, kept verbatim */
  readonly reference: string;
  /** Always strictly positive */
  readonly amount: Money;
}
