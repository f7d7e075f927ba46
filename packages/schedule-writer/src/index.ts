/**
 * @giftaid/schedule-writer
 *
 * Writes schedule workbooks and audit artifacts into a per-run output directory.
 */

export {
  writeRunArtifacts,
  MANUAL_REVIEW_FILE,
  AUDIT_LOG_FILE,
  TRANSACTIONS_COPY_FILE,
  DECLARATIONS_COPY_FILE,
} from './run-artifacts.js';
export type { RunArtifactsOptions, WrittenRun } from './run-artifacts.js';

export { createRunDirectory, nextRunDirectoryName, today } from './run-directory.js';

export { writeFileAtomic } from './atomic-write.js';

export {
  SCHEDULE_SHEET_NAME,
  EARLIEST_DATE_CAPTION,
  EARLIEST_DATE_CAPTION_CELL,
  EARLIEST_DATE_CELL,
  HEADER_ROW,
  SCHEDULE_HEADERS,
  DATE_FORMAT,
  AMOUNT_FORMAT,
  SCHEDULE_FORMATS,
  DEFAULT_SCHEDULE_FORMAT,
  scheduleFileName,
  checkScheduleWorkbook,
  createBlankScheduleWorkbook,
  loadTemplateWorkbook,
  fillSchedulePage,
  renderSchedulePage,
} from './schedule-workbook.js';
export type { ScheduleFormat } from './schedule-workbook.js';
