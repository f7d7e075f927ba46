/**
 * One schedule-building run: read, validate, match, schedule, write.
 */

import { TableValidationError, type CalendarDate, type RowIssue } from '@giftaid/core';
import {
  ScheduleEngine,
  formatDeferralWarning,
  formatRunSummary,
  type ScheduleReport,
} from '@giftaid/schedule-core';
import {
  AUDIT_LOG_FILE,
  DECLARATIONS_COPY_FILE,
  MANUAL_REVIEW_FILE,
  TRANSACTIONS_COPY_FILE,
  writeRunArtifacts,
  type WrittenRun,
} from '@giftaid/schedule-writer';
import {
  DECLARATIONS_TABLE,
  TRANSACTIONS_TABLE,
  loadDeclarations,
  loadTransactions,
  readTable,
} from '@giftaid/table-loader';
import type { RunSettings } from './config.js';
import type { Logger } from './logger.js';

export interface RunOutcome {
  report: ScheduleReport;
  written: WrittenRun;
}

export async function runScheduleBuilder(
  settings: RunSettings,
  logger: Logger,
  day?: CalendarDate
): Promise<RunOutcome> {
  logger.info('Reading input tables', {
    transactions: settings.transactionsPath,
    declarations: settings.declarationsPath,
  });
  const transactionsTable = await readTable(TRANSACTIONS_TABLE, settings.transactionsPath);
  const declarationsTable = await readTable(DECLARATIONS_TABLE, settings.declarationsPath);

  const transactions = loadTransactions(transactionsTable.rows);
  const declarations = loadDeclarations(declarationsTable.rows);

  const issues: RowIssue[] = [
    ...(transactions.ok ? [] : transactions.issues),
    ...(declarations.ok ? [] : declarations.issues),
  ];
  if (!transactions.ok || !declarations.ok) {
    throw new TableValidationError(issues);
  }
  logger.debug('Input tables valid', {
    transactionCount: transactions.records.length,
    declarationCount: declarations.records.length,
  });

  logger.info('Matching transactions to declarations');
  const engine = new ScheduleEngine({ matching: settings.matching, schedule: settings.schedule });
  const report = engine.build(transactions.records, declarations.records);

  const warning = formatDeferralWarning(report);
  if (warning) {
    logger.warn(warning, { deferredCount: report.summary.deferredCount });
  }
  if (report.pages.length === 0) {
    logger.info('No gift-aidable transactions found, no schedule workbook written');
  }

  logger.info('Writing run directory', { outputsDir: settings.outputsDir });
  const written = await writeRunArtifacts(report, {
    outputsDir: settings.outputsDir,
    inputs: {
      transactions: transactionsTable.content,
      declarations: declarationsTable.content,
    },
    format: settings.format,
    templatePath: settings.templatePath,
    day,
  });
  logger.info('Run directory written', { directory: written.directory, files: written.files.length });

  return { report, written };
}

/**
 * What the user reads on stdout once a run succeeds
 */
export function formatCompletionMessage(outcome: RunOutcome): string {
  const { written, report } = outcome;
  const files = [
    ...written.schedules.map((name) => `A completed Gift Aid schedule (${name})`),
    `Transactions that may be gift-aidable but need attention (${MANUAL_REVIEW_FILE})`,
    `A log of what was done with each row of transactions.csv (${AUDIT_LOG_FILE})`,
    `A copy of ${TRANSACTIONS_COPY_FILE}`,
    `A copy of ${DECLARATIONS_COPY_FILE}`,
  ];

  return [
    formatRunSummary(report),
    '',
    `Done. Files written to:\n${written.directory}`,
    'Please find within that folder:',
    ...files.map((file) => `\t- ${file}`),
    "After you've checked the schedule and resolved every transaction listed in " +
      `${MANUAL_REVIEW_FILE}, upload the schedule to make a Gift Aid claim.`,
  ].join('\n');
}
