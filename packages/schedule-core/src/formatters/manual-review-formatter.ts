/**
 * Manual Review Formatter
 *
 * Lists the ambiguous transactions whose donor has to be filled in by hand.
 */

import { describeDeclaration } from '@giftaid/core';
import type { ManualReviewEntry, ScheduleReport } from '../types/index.js';

export function formatManualReviewEntry(entry: ManualReviewEntry): string {
  const donors = entry.candidates.map(describeDeclaration).join(', ');
  return (
    `Transaction on row ${entry.sheetRow} of schedule page ${entry.page}, ` +
    `from row ${entry.transaction.rowNumber} of transactions.csv, ` +
    `possible donors were ${donors}`
  );
}

export function formatManualReview(report: ScheduleReport): string {
  return report.manualReview.map((entry) => `${formatManualReviewEntry(entry)}\n`).join('');
}
