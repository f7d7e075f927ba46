/**
 * Error types for schedule building
 * Messages are read by the people who maintain the input tables, so they say what to change
 */

import type { RowIssue } from '../types/index.js';

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'FILE_NOT_FOUND'
  | 'READ_FAILED'
  | 'HEADER_MISMATCH'
  | 'TEMPLATE_MISMATCH'
  | 'OUTPUT_DIRECTORY_FAILED'
  | 'WRITE_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'USAGE_ERROR'
  | 'UNKNOWN';

export interface ScheduleErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ScheduleError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ScheduleErrorDetails) {
    super(details.message);
    this.name = 'ScheduleError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, new.target);
  }

  /**
   * Message plus the suggested fix, for printing to a terminal
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Format one row issue as a single line a non-technical user can act on
 */
export function formatRowIssue(issue: RowIssue): string {
  const location =
    issue.column === 0
      ? `${issue.table}.csv row ${issue.rowNumber}`
      : `${issue.table}.csv row ${issue.rowNumber}, column ${issue.column} ("${issue.columnName}")`;
  const value = issue.value !== undefined ? ` Value: "${issue.value}".` : '';
  const expected = issue.expected ? ` Expected: ${issue.expected}.` : '';
  return `${location}: ${issue.message}${value}${expected}`;
}

/**
 * Raised once per run when either input table has invalid rows.
 * Carries every issue found, not just the first.
 */
export class TableValidationError extends ScheduleError {
  readonly issues: readonly RowIssue[];

  constructor(issues: readonly RowIssue[]) {
    const tables = [...new Set(issues.map((i) => `${i.table}.csv`))].join(' and ');
    super({
      code: 'VALIDATION_FAILED',
      message: `Found ${issues.length} problem${issues.length === 1 ? '' : 's'} in ${tables}`,
      suggestion: 'Fix every listed cell in the input tables, then run again.',
      context: { issueCount: issues.length },
    });
    this.name = 'TableValidationError';
    this.issues = issues;
  }

  override toActionableMessage(): string {
    const lines = [`Error [${this.code}]: ${this.message}:`];
    for (const issue of this.issues) {
      lines.push(`- ${formatRowIssue(issue)}`);
    }
    if (this.suggestion) {
      lines.push(`Suggested action: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Helper to wrap unknown errors as ScheduleError
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = 'UNKNOWN',
  context?: Record<string, unknown>
): ScheduleError {
  if (error instanceof ScheduleError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ScheduleError({
    code: defaultCode,
    message,
    cause,
    context,
  });
}
