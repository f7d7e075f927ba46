/**
 * Type exports for schedule-core
 */

export type { MatchOutcome, MatchOptions, MatchedTransaction } from './matching.js';

export type {
  Placement,
  ScheduleRow,
  SchedulePage,
  ManualReviewEntry,
  Disposition,
  AuditEntry,
  ScheduleOptions,
  ScheduleSummary,
  ScheduleReport,
} from './schedule.js';
