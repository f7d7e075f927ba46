export { formatAuditEntry, formatAuditLog } from './audit-log-formatter.js';
export { formatManualReviewEntry, formatManualReview } from './manual-review-formatter.js';
export { formatRunSummary, formatDeferralWarning } from './summary-formatter.js';
