/**
 * Audit Log Formatter
 *
 * One line per input transaction, in input order. References are quoted as
 * JSON strings so line breaks inside them stay escaped. No timestamps, so two
 * runs over the same tables produce the same text.
 */

import type { AuditEntry, ScheduleReport } from '../types/index.js';

export function formatAuditEntry(entry: AuditEntry): string {
  return `Row ${entry.rowNumber}, reference ${JSON.stringify(entry.reference)}: ${entry.reason}`;
}

export function formatAuditLog(report: ScheduleReport): string {
  return report.audit.map((entry) => `${formatAuditEntry(entry)}\n`).join('');
}
