/**
 * Reads an input table from a UTF-8 CSV file.
 * Handles the file-level checks: existence, readability, header row.
 */

import { readFile } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { HEADER_ROW_NUMBER, ScheduleError } from '@giftaid/core';
import type { TableRow } from './loader.js';
import type { TableSpec } from './table-spec.js';

export interface TableContents {
  /** Absolute or caller-relative path the table was read from */
  filePath: string;
  header: string[];
  /** Data rows, numbered as a spreadsheet would number them */
  rows: TableRow[];
}

/** A table read from disk, with the bytes it was parsed from */
export interface TableFile extends TableContents {
  content: Buffer;
}

function isBlank(cells: readonly string[]): boolean {
  return cells.every((cell) => cell.trim() === '');
}

/**
 * Parse CSV text into rows of string cells. Rows of any length are returned;
 * column counts are checked per row by the loader.
 */
export function parseCsv(content: string | Buffer): string[][] {
  return parse(content, {
    bom: true,
    columns: false,
    relax_column_count: true,
    skip_empty_lines: false,
    trim: false,
  }) as string[][];
}

function checkHeader(spec: TableSpec, header: readonly string[], filePath: string): void {
  const expected = spec.columns.map((c) => c.header);
  const matches =
    header.length === expected.length &&
    header.every((h, i) => h.trim().toLowerCase() === expected[i]?.toLowerCase());

  if (!matches) {
    const found = header.map((h) => `"${h}"`).join(', ');
    const wanted = expected.map((h) => `"${h}"`).join(', ');
    throw new ScheduleError({
      code: 'HEADER_MISMATCH',
      message: `Expected ${basename(filePath)} to have ${expected.length} columns with headers ${wanted}, instead got headers ${found}`,
      suggestion: `Make the first row of ${basename(filePath)} match the template table exactly.`,
      context: { filePath, header },
    });
  }
}

/**
 * Split parsed records into the header and numbered data rows.
 * Blank rows are skipped but still count towards row numbers.
 */
export function toTableContents(
  spec: TableSpec,
  records: readonly string[][],
  filePath: string
): TableContents {
  const [header, ...data] = records;
  if (!header) {
    throw new ScheduleError({
      code: 'HEADER_MISMATCH',
      message: `${basename(filePath)} is empty`,
      suggestion: `Start ${basename(filePath)} with the header row: ${spec.columns.map((c) => c.header).join(', ')}.`,
      context: { filePath },
    });
  }

  checkHeader(spec, header, filePath);

  const rows: TableRow[] = [];
  data.forEach((cells, index) => {
    if (isBlank(cells)) return;
    rows.push({ rowNumber: HEADER_ROW_NUMBER + index + 1, cells });
  });

  return { filePath, header, rows };
}

export async function readTable(spec: TableSpec, filePath: string): Promise<TableFile> {
  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      throw new ScheduleError({
        code: 'FILE_NOT_FOUND',
        message: `There is no file named "${basename(filePath)}" in ${dirname(filePath)}`,
        suggestion: `Export the ${spec.name} table as CSV and save it as ${basename(filePath)} in that folder.`,
        context: { filePath },
      });
    }
    throw new ScheduleError({
      code: 'READ_FAILED',
      message: `Cannot read ${filePath}: ${(error as Error).message}`,
      suggestion: code === 'EACCES' ? 'Check file permissions.' : undefined,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }

  let records: string[][];
  try {
    records = parseCsv(content);
  } catch (error) {
    throw new ScheduleError({
      code: 'READ_FAILED',
      message: `${basename(filePath)} is not a valid CSV file: ${(error as Error).message}`,
      suggestion: 'Re-export the table from your spreadsheet program as "CSV (comma separated)".',
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }

  return { ...toTableContents(spec, records, filePath), content };
}
