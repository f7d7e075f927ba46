/**
 * Run Summary Formatter
 *
 * Short plain-text summary printed once the run has finished.
 */

import { formatMoney } from '@giftaid/core';
import type { ScheduleReport } from '../types/index.js';

export function formatRunSummary(report: ScheduleReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push(`Transactions read: ${summary.transactionCount}`);
  lines.push(`- Scheduled: ${summary.scheduledCount} (total ${formatMoney(summary.scheduledAmount)})`);
  lines.push(`  - With donor details: ${summary.resolvedCount}`);
  lines.push(`  - Needing manual donor assignment: ${summary.ambiguousCount}`);
  lines.push(`- Not gift-aidable (no matching declaration): ${summary.unmatchedCount}`);
  if (summary.ineligibleCount > 0) {
    lines.push(`- Outside declaration validity: ${summary.ineligibleCount}`);
  }
  if (summary.deferredCount > 0) {
    lines.push(`- Deferred to the next run: ${summary.deferredCount}`);
  }
  lines.push(`Schedule pages: ${summary.pageCount}`);

  return lines.join('\n');
}

/**
 * Warning for runs that hit the schedule capacity, or null when nothing was deferred
 */
export function formatDeferralWarning(report: ScheduleReport): string | null {
  const { summary } = report;
  if (summary.deferredCount === 0 || summary.firstDeferredRowNumber === undefined) {
    return null;
  }
  const lastIncluded = summary.firstDeferredRowNumber - 1;
  return (
    `More than ${summary.capacity} gift-aidable transactions detected, but this run can hold at most ` +
    `${summary.capacity}. ${summary.deferredCount} transactions from row ${summary.firstDeferredRowNumber} ` +
    `of transactions.csv onwards were deferred. To process them, delete rows 2-${lastIncluded} of the file ` +
    'once this run has completed successfully, then run again.'
  );
}
