/**
 * Run Artifacts
 *
 * Writes everything one run produces into a fresh run directory: a schedule
 * workbook per page, the manual review list, the audit log, and copies of
 * both input tables. A run either leaves a complete directory behind or
 * nothing at all.
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { ScheduleError, wrapError, type CalendarDate } from '@giftaid/core';
import { formatAuditLog, formatManualReview, type ScheduleReport } from '@giftaid/schedule-core';
import { writeFileAtomic } from './atomic-write.js';
import { createRunDirectory, today } from './run-directory.js';
import {
  DEFAULT_SCHEDULE_FORMAT,
  renderSchedulePage,
  scheduleFileName,
  type ScheduleFormat,
} from './schedule-workbook.js';

export const MANUAL_REVIEW_FILE = 'transactions_that_need_manual_handling.txt';
export const AUDIT_LOG_FILE = 'transactions_log.txt';
export const TRANSACTIONS_COPY_FILE = 'transactions.csv';
export const DECLARATIONS_COPY_FILE = 'declarations.csv';

export interface RunArtifactsOptions {
  /** Directory holding all run directories */
  outputsDir: string;
  /** Bytes of both input tables, copied verbatim into the run directory */
  inputs: {
    transactions: string | Buffer;
    declarations: string | Buffer;
  };
  format?: ScheduleFormat;
  /** Regulator workbook to fill instead of the built-in layout */
  templatePath?: string;
  /** Day used to name the run directory (default: today, local time) */
  day?: CalendarDate;
}

export interface WrittenRun {
  directory: string;
  /** Workbook file names, one per page */
  schedules: string[];
  /** Every file written, in the order written */
  files: string[];
}

export async function writeRunArtifacts(
  report: ScheduleReport,
  options: RunArtifactsOptions
): Promise<WrittenRun> {
  const format = options.format ?? DEFAULT_SCHEDULE_FORMAT;

  // render before claiming a directory so a bad template leaves nothing behind
  const workbooks: Array<{ name: string; content: Buffer }> = [];
  for (const page of report.pages) {
    workbooks.push({
      name: scheduleFileName(page.number, format),
      content: await renderSchedulePage(page, options.templatePath),
    });
  }

  const directory = await createRunDirectory(options.outputsDir, options.day ?? today());
  const written: WrittenRun = { directory, schedules: [], files: [] };

  const put = async (name: string, content: string | Buffer): Promise<void> => {
    await writeFileAtomic(join(directory, name), content);
    written.files.push(name);
  };

  try {
    for (const workbook of workbooks) {
      await put(workbook.name, workbook.content);
      written.schedules.push(workbook.name);
    }
    await put(MANUAL_REVIEW_FILE, formatManualReview(report));
    await put(AUDIT_LOG_FILE, formatAuditLog(report));
    await put(TRANSACTIONS_COPY_FILE, options.inputs.transactions);
    await put(DECLARATIONS_COPY_FILE, options.inputs.declarations);
  } catch (error) {
    await removeRunDirectory(directory, error);
    if (error instanceof ScheduleError) throw error;
    throw new ScheduleError({
      code: 'WRITE_FAILED',
      message: `Failed to write run output to ${directory}: ${(error as Error).message}`,
      suggestion: 'Check free disk space and permissions on the outputs directory, then run again.',
      cause: error instanceof Error ? error : undefined,
      context: { directory },
    });
  }

  return written;
}

async function removeRunDirectory(directory: string, original: unknown): Promise<void> {
  try {
    await rm(directory, { recursive: true, force: true });
  } catch (cleanupError) {
    throw wrapError(cleanupError, 'WRITE_FAILED', {
      directory,
      originalError: original instanceof Error ? original.message : String(original),
    });
  }
}
