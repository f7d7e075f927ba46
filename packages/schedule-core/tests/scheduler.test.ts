import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import type { Declaration, Transaction } from '@giftaid/core';
import {
  ScheduleEngine,
  buildSchedule,
  checkEligibility,
  createScheduleEngine,
  matchAll,
} from '../src/index.js';
import { makeDeclaration, makeTransaction } from './fixtures.js';

function scenario() {
  const johnSmith = makeDeclaration({
    rowNumber: 2,
    title: 'Mr',
    firstName: 'John',
    lastName: 'Smith',
    identifier: 'FP John Smith Giving',
  });
  const hannahJane = makeDeclaration({
    rowNumber: 3,
    title: '',
    firstName: 'Hannah',
    lastName: 'Jane',
    identifier: 'FP Hannah Jane',
  });
  const janeDoe = makeDeclaration({
    rowNumber: 4,
    title: 'Ms',
    firstName: 'Jane',
    lastName: 'Doe',
    identifier: 'Jane Doe',
  });
  const transactions: Transaction[] = [
    makeTransaction({ rowNumber: 2, reference: 'FP John Smith Giving Jan', amount: { pence: 12300 } }),
    makeTransaction({ rowNumber: 3, reference: 'FP Hannah Jane Doe', amount: { pence: 5000 } }),
    makeTransaction({ rowNumber: 4, reference: 'Unrelated payment', amount: { pence: 999 } }),
  ];
  return { declarations: [johnSmith, hannahJane, janeDoe], transactions };
}

function repeated(count: number, declaration: Declaration): Transaction[] {
  return Array.from({ length: count }, (_, index) =>
    makeTransaction({ rowNumber: index + 2, reference: `${declaration.identifier} #${index}` })
  );
}

describe('buildSchedule', () => {
  it('places resolved and ambiguous transactions and leaves unmatched ones out', () => {
    const { declarations, transactions } = scenario();
    const report = buildSchedule(matchAll(transactions, declarations));

    expect(report.pages).toHaveLength(1);
    const page = report.pages[0];
    expect(page?.rows.map((row) => [row.transaction.rowNumber, row.sheetRow, row.declaration?.rowNumber ?? null])).toEqual([
      [2, 25, 2],
      [3, 26, null],
    ]);
    expect(page?.total).toEqual({ pence: 17300 });
    expect(page?.earliestDate).toEqual({ year: 2024, month: 1, day: 5 });
  });

  it('records a manual review entry for each ambiguous row', () => {
    const { declarations, transactions } = scenario();
    const report = buildSchedule(matchAll(transactions, declarations));

    expect(report.manualReview).toHaveLength(1);
    expect(report.manualReview[0]).toMatchObject({ page: 1, position: 2, sheetRow: 26 });
    expect(report.manualReview[0]?.candidates.map((c) => c.rowNumber)).toEqual([3, 4]);
  });

  it('writes one audit entry per transaction, in input order', () => {
    const { declarations, transactions } = scenario();
    const report = buildSchedule(matchAll(transactions, declarations));

    expect(report.audit.map((entry) => entry.reason)).toEqual([
      'detected as gift-aidable transaction from Mr John Smith (declarations row 2), added to schedule page 1 row 25',
      'detected as gift-aidable transaction, but found multiple possible donors: ' +
        'Hannah Jane (declarations row 3), Ms Jane Doe (declarations row 4); ' +
        'added to schedule page 1 row 26 without donor details for manual handling',
      'no matching declaration',
    ]);
    expect(report.audit.map((entry) => entry.disposition)).toEqual(['resolved', 'ambiguous', 'unmatched']);
  });

  it('summarises the run', () => {
    const { declarations, transactions } = scenario();
    const { summary } = buildSchedule(matchAll(transactions, declarations));

    expect(summary).toEqual({
      transactionCount: 3,
      scheduledCount: 2,
      resolvedCount: 1,
      ambiguousCount: 1,
      unmatchedCount: 1,
      ineligibleCount: 0,
      deferredCount: 0,
      pageCount: 1,
      scheduledAmount: { pence: 17300 },
      firstDeferredRowNumber: undefined,
      capacity: 1000,
    });
  });

  it('produces no pages when nothing matches', () => {
    const report = buildSchedule(
      matchAll([makeTransaction({ reference: 'nothing here' })], [makeDeclaration({ identifier: 'ABC' })])
    );

    expect(report.pages).toEqual([]);
    expect(report.audit).toHaveLength(1);
  });

  it('fills exactly one full page at capacity', () => {
    const declaration = makeDeclaration({ identifier: 'DONOR-1' });
    const report = buildSchedule(matchAll(repeated(1000, declaration), [declaration]));

    expect(report.pages).toHaveLength(1);
    expect(report.pages[0]?.rows).toHaveLength(1000);
    expect(report.pages[0]?.rows[999]?.sheetRow).toBe(1024);
    expect(report.deferred).toEqual([]);
  });

  it('defers the transaction beyond capacity and says so in the audit log', () => {
    const declaration = makeDeclaration({ identifier: 'DONOR-1' });
    const transactions = repeated(1001, declaration);
    const report = buildSchedule(matchAll(transactions, [declaration]));

    expect(report.pages).toHaveLength(1);
    expect(report.pages[0]?.rows).toHaveLength(1000);
    expect(report.deferred.map((t) => t.rowNumber)).toEqual([1002]);
    expect(report.audit[1000]).toMatchObject({
      rowNumber: 1002,
      disposition: 'deferred',
      reason: 'schedule capacity of 1000 rows reached, defer to next run',
    });
    expect(report.audit[1000]?.placement).toBeUndefined();
    expect(report.summary.firstDeferredRowNumber).toBe(1002);
  });

  it('still audits unmatched transactions that come after the capacity is reached', () => {
    const declaration = makeDeclaration({ identifier: 'DONOR-1' });
    const transactions = [
      makeTransaction({ rowNumber: 2, reference: 'DONOR-1' }),
      makeTransaction({ rowNumber: 3, reference: 'DONOR-1' }),
      makeTransaction({ rowNumber: 4, reference: 'other' }),
    ];
    const report = buildSchedule(matchAll(transactions, [declaration]), { maxRowsPerPage: 1 });

    expect(report.audit.map((entry) => entry.disposition)).toEqual(['resolved', 'deferred', 'unmatched']);
    expect(report.audit[1]?.reason).toBe('schedule capacity of 1 rows reached, defer to next run');
  });

  it('spreads rows over several pages when more pages are allowed', () => {
    const declaration = makeDeclaration({ identifier: 'DONOR-1' });
    const transactions = repeated(5, declaration);
    const report = buildSchedule(matchAll(transactions, [declaration]), { maxRowsPerPage: 2, maxPages: 3 });

    expect(report.pages.map((page) => page.number)).toEqual([1, 2, 3]);
    expect(report.pages.map((page) => page.rows.length)).toEqual([2, 2, 1]);
    expect(report.pages[1]?.rows.map((row) => [row.position, row.sheetRow])).toEqual([
      [1, 25],
      [2, 26],
    ]);
  });

  it('reports the earliest donation date of each page', () => {
    const declaration = makeDeclaration({ identifier: 'D' });
    const transactions = [
      makeTransaction({ reference: 'D', date: { year: 2024, month: 3, day: 9 } }),
      makeTransaction({ reference: 'D', date: { year: 2023, month: 12, day: 31 } }),
      makeTransaction({ reference: 'D', date: { year: 2024, month: 1, day: 1 } }),
    ];

    const report = buildSchedule(matchAll(transactions, [declaration]));

    expect(report.pages[0]?.earliestDate).toEqual({ year: 2023, month: 12, day: 31 });
  });

  it.each([0, 1001, 2.5])('rejects maxRowsPerPage of %s', (maxRowsPerPage) => {
    expect(() => buildSchedule([], { maxRowsPerPage })).toThrow(/maxRowsPerPage must be an integer between 1 and 1000/);
  });

  it('rejects a non-positive page limit', () => {
    expect(() => buildSchedule([], { maxPages: 0 })).toThrow('maxPages must be a positive integer (got 0)');
  });

  it('is deterministic', () => {
    const { declarations, transactions } = scenario();

    expect(buildSchedule(matchAll(transactions, declarations))).toEqual(
      buildSchedule(matchAll(transactions, declarations))
    );
  });

  it('schedules exactly the matched transactions, up to capacity', () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom('A', 'B', 'AB', 'none'), { maxLength: 40 }),
        fc.integer({ min: 1, max: 10 }),
        (references, maxRowsPerPage) => {
          const declarations = [makeDeclaration({ identifier: 'A' }), makeDeclaration({ identifier: 'B' })];
          const transactions = references.map((reference) => makeTransaction({ reference }));
          const report = buildSchedule(matchAll(transactions, declarations), { maxRowsPerPage });

          const matchable = references.filter((reference) => reference !== 'none').length;
          const scheduled = report.pages.reduce((sum, page) => sum + page.rows.length, 0);
          expect(scheduled).toBe(Math.min(matchable, maxRowsPerPage));
          expect(report.deferred).toHaveLength(Math.max(0, matchable - maxRowsPerPage));
          expect(report.audit).toHaveLength(references.length);
          expect(report.manualReview).toHaveLength(
            report.pages.flatMap((page) => page.rows).filter((row) => row.declaration === null).length
          );
        }
      )
    );
  });
});

describe('validity windows', () => {
  const declaration = makeDeclaration({
    rowNumber: 7,
    title: '',
    firstName: 'Ann',
    lastName: 'Lee',
    identifier: 'ANN LEE',
    declarationDate: { year: 2022, month: 3, day: 15 },
    validity: { fourYearsBefore: false, dayOfDeclaration: true, afterDayOfDeclaration: true },
  });
  const before = makeTransaction({ rowNumber: 2, reference: 'ANN LEE', date: { year: 2021, month: 1, day: 1 } });
  const onDay = makeTransaction({ rowNumber: 3, reference: 'ANN LEE', date: { year: 2022, month: 3, day: 15 } });
  const tooOld = makeTransaction({ rowNumber: 4, reference: 'ANN LEE', date: { year: 2018, month: 3, day: 14 } });

  it('are ignored unless enabled', () => {
    const report = buildSchedule(matchAll([before, onDay, tooOld], [declaration]));

    expect(report.summary.scheduledCount).toBe(3);
    expect(report.summary.ineligibleCount).toBe(0);
  });

  it('keep ineligible transactions off the schedule when enabled', () => {
    const report = buildSchedule(matchAll([before, onDay, tooOld], [declaration]), {
      enforceValidityWindows: true,
    });

    expect(report.audit.map((entry) => entry.disposition)).toEqual(['ineligible', 'resolved', 'ineligible']);
    expect(report.audit[2]?.reason).toBe(
      'had declaration from Ann Lee (declarations row 7), however transaction occurred more than ' +
        'four years before declaration date of 2022-03-15'
    );
    expect(report.pages[0]?.rows.map((row) => row.sheetRow)).toEqual([25]);
  });

  it('classify each window', () => {
    expect(checkEligibility(before, declaration).verdict).toBe('not-valid-four-years-before');
    expect(checkEligibility(onDay, declaration).verdict).toBe('eligible');
    expect(checkEligibility(tooOld, declaration).verdict).toBe('before-four-year-window');
    expect(
      checkEligibility(onDay, { ...declaration, validity: { ...declaration.validity, dayOfDeclaration: false } })
        .verdict
    ).toBe('not-valid-on-day-of-declaration');
    expect(
      checkEligibility(
        makeTransaction({ date: { year: 2023, month: 1, day: 1 } }),
        { ...declaration, validity: { ...declaration.validity, afterDayOfDeclaration: false } }
      ).verdict
    ).toBe('not-valid-after-day-of-declaration');
  });

  it('treat the day exactly four years before as inside the window', () => {
    const edge = makeTransaction({ date: { year: 2018, month: 3, day: 15 } });

    expect(checkEligibility(edge, { ...declaration, validity: { ...declaration.validity, fourYearsBefore: true } })).toEqual({
      verdict: 'eligible',
    });
  });
});

describe('ScheduleEngine', () => {
  it('matches and schedules in one call', () => {
    const { declarations, transactions } = scenario();
    const engine = new ScheduleEngine();

    expect(engine.build(transactions, declarations)).toEqual(buildSchedule(matchAll(transactions, declarations)));
  });

  it('passes matching options through', () => {
    const declaration = makeDeclaration({ identifier: 'John Smith' });
    const transactions = [makeTransaction({ reference: 'JOHN SMITH 2024' })];

    expect(createScheduleEngine().build(transactions, [declaration]).summary.scheduledCount).toBe(0);
    expect(
      createScheduleEngine({ matching: { normalization: 'letters-only' } }).build(transactions, [declaration]).summary
        .scheduledCount
    ).toBe(1);
  });
});
