/**
 * @giftaid/schedule-core
 *
 * Matches transactions to declarations and lays them out as schedule pages.
 */

// Types
export * from './types/index.js';

import { ScheduleEngine as _ScheduleEngine } from './engine/schedule-engine.js';
export { ScheduleEngine } from './engine/schedule-engine.js';
export type { ScheduleEngineOptions } from './engine/schedule-engine.js';

// Matching
export { createMatcher, match, matchAll } from './matching/index.js';

// Eligibility
export { checkEligibility } from './eligibility/index.js';
export type { Eligibility, EligibilityVerdict } from './eligibility/index.js';

// Scheduling
export { buildSchedule } from './scheduling/index.js';

// Formatters
export {
  formatAuditEntry,
  formatAuditLog,
  formatManualReviewEntry,
  formatManualReview,
  formatRunSummary,
  formatDeferralWarning,
} from './formatters/index.js';

/**
 * Factory function to create a ScheduleEngine
 */
export function createScheduleEngine(
  options?: ConstructorParameters<typeof _ScheduleEngine>[0]
): _ScheduleEngine {
  return new _ScheduleEngine(options);
}
