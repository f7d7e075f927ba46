/**
 * Scheduler
 *
 * Lays matched transactions out as schedule pages and records what happened
 * to every transaction. Input order is kept throughout: rows, manual review
 * entries and audit entries all follow the order of the transactions table.
 */

import {
  FIRST_SCHEDULE_ROW,
  MAX_ROWS,
  ScheduleError,
  compareDates,
  describeDeclaration,
  sumMoney,
  type Declaration,
  type Transaction,
} from '@giftaid/core';
import { checkEligibility } from '../eligibility/index.js';
import type {
  AuditEntry,
  ManualReviewEntry,
  MatchedTransaction,
  Placement,
  SchedulePage,
  ScheduleOptions,
  ScheduleReport,
  ScheduleRow,
  ScheduleSummary,
} from '../types/index.js';

interface ResolvedOptions {
  maxRowsPerPage: number;
  maxPages: number;
  enforceValidityWindows: boolean;
}

function resolveOptions(options: ScheduleOptions): ResolvedOptions {
  const maxRowsPerPage = options.maxRowsPerPage ?? MAX_ROWS;
  const maxPages = options.maxPages ?? 1;

  if (!Number.isInteger(maxRowsPerPage) || maxRowsPerPage < 1 || maxRowsPerPage > MAX_ROWS) {
    throw new ScheduleError({
      code: 'CONFIGURATION_ERROR',
      message: `maxRowsPerPage must be an integer between 1 and ${MAX_ROWS} (got ${maxRowsPerPage})`,
      suggestion: `Each schedule can hold at most ${MAX_ROWS} donations; lower the setting.`,
    });
  }
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new ScheduleError({
      code: 'CONFIGURATION_ERROR',
      message: `maxPages must be a positive integer (got ${maxPages})`,
    });
  }

  return {
    maxRowsPerPage,
    maxPages,
    enforceValidityWindows: options.enforceValidityWindows ?? false,
  };
}

function describeCandidates(candidates: readonly Declaration[]): string {
  return candidates.map(describeDeclaration).join(', ');
}

function describePlacement(placement: Placement): string {
  return `schedule page ${placement.page} row ${placement.sheetRow}`;
}

/**
 * Build the schedule for one run.
 */
export function buildSchedule(
  matched: readonly MatchedTransaction[],
  options: ScheduleOptions = {}
): ScheduleReport {
  const { maxRowsPerPage, maxPages, enforceValidityWindows } = resolveOptions(options);
  const capacity = maxRowsPerPage * maxPages;

  const rows: ScheduleRow[] = [];
  const manualReview: ManualReviewEntry[] = [];
  const audit: AuditEntry[] = [];
  const deferred: Transaction[] = [];

  const nextPlacement = (): Placement | null => {
    if (rows.length >= capacity) return null;
    const index = rows.length;
    const position = (index % maxRowsPerPage) + 1;
    return {
      page: Math.floor(index / maxRowsPerPage) + 1,
      position,
      sheetRow: FIRST_SCHEDULE_ROW + position - 1,
    };
  };

  const defer = (
    transaction: Transaction,
    entry: Pick<AuditEntry, 'donor' | 'candidates'>
  ): void => {
    deferred.push(transaction);
    audit.push({
      rowNumber: transaction.rowNumber,
      reference: transaction.reference,
      amount: transaction.amount,
      disposition: 'deferred',
      reason: `schedule capacity of ${capacity} rows reached, defer to next run`,
      ...entry,
    });
  };

  for (const { transaction, outcome } of matched) {
    const base = {
      rowNumber: transaction.rowNumber,
      reference: transaction.reference,
      amount: transaction.amount,
    };

    switch (outcome.kind) {
      case 'unmatched':
        audit.push({ ...base, disposition: 'unmatched', reason: 'no matching declaration' });
        break;

      case 'resolved': {
        const { declaration } = outcome;
        if (enforceValidityWindows) {
          const eligibility = checkEligibility(transaction, declaration);
          if (eligibility.verdict !== 'eligible') {
            audit.push({
              ...base,
              disposition: 'ineligible',
              reason: `had declaration from ${describeDeclaration(declaration)}, however ${eligibility.reason ?? eligibility.verdict}`,
              donor: declaration,
            });
            break;
          }
        }

        const placement = nextPlacement();
        if (!placement) {
          defer(transaction, { donor: declaration });
          break;
        }
        rows.push({ ...placement, transaction, declaration });
        audit.push({
          ...base,
          disposition: 'resolved',
          reason: `detected as gift-aidable transaction from ${describeDeclaration(declaration)}, added to ${describePlacement(placement)}`,
          donor: declaration,
          placement,
        });
        break;
      }

      case 'ambiguous': {
        const { candidates } = outcome;
        const placement = nextPlacement();
        if (!placement) {
          defer(transaction, { candidates });
          break;
        }
        rows.push({ ...placement, transaction, declaration: null });
        manualReview.push({ ...placement, transaction, candidates });
        audit.push({
          ...base,
          disposition: 'ambiguous',
          reason:
            `detected as gift-aidable transaction, but found multiple possible donors: ${describeCandidates(candidates)}; ` +
            `added to ${describePlacement(placement)} without donor details for manual handling`,
          candidates,
          placement,
        });
        break;
      }

      default: {
        const exhaustive: never = outcome;
        throw new Error(`Unexpected match outcome: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  const pages = paginate(rows, maxRowsPerPage);
  const count = (disposition: AuditEntry['disposition']): number =>
    audit.filter((entry) => entry.disposition === disposition).length;

  const summary: ScheduleSummary = {
    transactionCount: matched.length,
    scheduledCount: rows.length,
    resolvedCount: count('resolved'),
    ambiguousCount: count('ambiguous'),
    unmatchedCount: count('unmatched'),
    ineligibleCount: count('ineligible'),
    deferredCount: deferred.length,
    pageCount: pages.length,
    scheduledAmount: sumMoney(rows.map((row) => row.transaction.amount)),
    firstDeferredRowNumber: deferred[0]?.rowNumber,
    capacity,
  };

  return { pages, manualReview, audit, deferred, summary };
}

function paginate(rows: readonly ScheduleRow[], maxRowsPerPage: number): SchedulePage[] {
  const pages: SchedulePage[] = [];

  for (let start = 0; start < rows.length; start += maxRowsPerPage) {
    const pageRows = rows.slice(start, start + maxRowsPerPage);
    const [first] = pageRows;
    if (!first) break;

    let earliestDate = first.transaction.date;
    for (const row of pageRows) {
      if (compareDates(row.transaction.date, earliestDate) < 0) {
        earliestDate = row.transaction.date;
      }
    }

    pages.push({
      number: first.page,
      rows: pageRows,
      earliestDate,
      total: sumMoney(pageRows.map((row) => row.transaction.amount)),
    });
  }

  return pages;
}
