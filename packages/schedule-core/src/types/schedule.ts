/**
 * Schedule Types
 *
 * Types for laying matched transactions out as regulator schedule pages.
 */

import type { CalendarDate, Declaration, Money, Transaction } from '@giftaid/core';

/** Where a transaction landed in the schedule */
export interface Placement {
  /** 1-based page (one workbook per page) */
  page: number;
  /** 1-based position within the page */
  position: number;
  /** Spreadsheet row of the regulator template holding this transaction */
  sheetRow: number;
}

export interface ScheduleRow extends Placement {
  transaction: Transaction;
  /** null for ambiguous matches awaiting manual donor assignment */
  declaration: Declaration | null;
}

export interface SchedulePage {
  number: number;
  rows: ScheduleRow[];
  /** Earliest donation date on the page */
  earliestDate: CalendarDate;
  total: Money;
}

export interface ManualReviewEntry extends Placement {
  transaction: Transaction;
  /** Every declaration whose identifier occurs in the reference, in declaration order */
  candidates: readonly Declaration[];
}

export type Disposition =
  | 'unmatched'
  | 'resolved'
  | 'ambiguous'
  | 'ineligible'
  | 'deferred';

export interface AuditEntry {
  rowNumber: number;
  reference: string;
  amount: Money;
  disposition: Disposition;
  /** Human-readable explanation of the disposition */
  reason: string;
  /** The matched declaration (resolved and ineligible) */
  donor?: Declaration;
  /** All candidate declarations (ambiguous, and deferred ambiguous) */
  candidates?: readonly Declaration[];
  /** Present only for transactions that made it into the schedule */
  placement?: Placement;
}

export interface ScheduleOptions {
  /** Rows per schedule page (default and maximum: 1000) */
  maxRowsPerPage?: number;
  /** Pages produced per run before deferring (default: 1) */
  maxPages?: number;
  /** Check declaration validity windows against transaction dates (default: false) */
  enforceValidityWindows?: boolean;
}

export interface ScheduleSummary {
  transactionCount: number;
  scheduledCount: number;
  resolvedCount: number;
  ambiguousCount: number;
  unmatchedCount: number;
  ineligibleCount: number;
  deferredCount: number;
  pageCount: number;
  scheduledAmount: Money;
  /** Row of transactions.csv of the first deferred transaction */
  firstDeferredRowNumber?: number;
  /** Row capacity of one run */
  capacity: number;
}

export interface ScheduleReport {
  pages: SchedulePage[];
  manualReview: ManualReviewEntry[];
  /** One entry per input transaction, in input order */
  audit: AuditEntry[];
  deferred: Transaction[];
  summary: ScheduleSummary;
}
