export {
  ScheduleError,
  TableValidationError,
  formatRowIssue,
  wrapError,
} from './schedule-error.js';
export type { ErrorCode, ScheduleErrorDetails } from './schedule-error.js';
