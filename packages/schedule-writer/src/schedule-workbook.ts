/**
 * Schedule Workbook
 *
 * Lays one schedule page out as the regulator's spreadsheet: a single
 * worksheet, the earliest donation date in D13, and one donation per row
 * from row 25 onwards. A regulator template can be supplied; it is checked
 * before anything is written into it.
 */

import ExcelJS from 'exceljs';
import {
  FIRST_SCHEDULE_ROW,
  MAX_ROWS,
  ScheduleError,
  toPounds,
  toUtcDate,
} from '@giftaid/core';
import type { SchedulePage } from '@giftaid/schedule-core';

export const SCHEDULE_SHEET_NAME = 'R68GAD_V1_00_0_EN';

export const EARLIEST_DATE_CAPTION_CELL = 'D12';
export const EARLIEST_DATE_CELL = 'D13';
export const EARLIEST_DATE_CAPTION = 'Earliest donation date in the period of claim. (DD/MM/YY)';

export const HEADER_ROW = 23;
/** Column B */
const FIRST_HEADER_COLUMN = 2;
export const SCHEDULE_HEADERS = [
  'Item',
  'Title',
  'First name',
  'Last name',
  'House name or number',
  'Postcode',
  'Aggregated donations',
  'Sponsored event',
  'Donation date',
  'Amount',
] as const;

export const DATE_FORMAT = 'dd/mm/yy';
export const AMOUNT_FORMAT = '#,##0.00';

export type ScheduleFormat = 'excel' | 'libre';
export const SCHEDULE_FORMATS = ['excel', 'libre'] as const satisfies readonly ScheduleFormat[];
export const DEFAULT_SCHEDULE_FORMAT: ScheduleFormat = 'libre';

export function scheduleFileName(page: number, format: ScheduleFormat): string {
  return `gift_aid_schedule_${page}__${format}_.xlsx`;
}

function mismatch(templatePath: string, message: string): ScheduleError {
  return new ScheduleError({
    code: 'TEMPLATE_MISMATCH',
    message: `${templatePath}: ${message}`,
    suggestion: 'Download a fresh copy of the Gift Aid schedule spreadsheet and point templatePath at it.',
    context: { templatePath },
  });
}

/**
 * Check that a workbook has the regulator layout this writer fills in
 */
export function checkScheduleWorkbook(workbook: ExcelJS.Workbook, templatePath: string): ExcelJS.Worksheet {
  const sheets = workbook.worksheets;
  const [sheet] = sheets;
  if (!sheet) {
    throw mismatch(templatePath, `Workbook has no worksheets, expected one named "${SCHEDULE_SHEET_NAME}"`);
  }
  if (sheets.length > 1) {
    throw mismatch(
      templatePath,
      `Expected there to be only one worksheet in the workbook, instead found ${sheets.length}`
    );
  }

  const caption = sheet.getCell(EARLIEST_DATE_CAPTION_CELL).text;
  if (caption !== EARLIEST_DATE_CAPTION) {
    throw mismatch(
      templatePath,
      `Didn't find the earliest donation date description in cell ${EARLIEST_DATE_CAPTION_CELL}. ` +
        `Expected "${EARLIEST_DATE_CAPTION}", instead got "${caption}"`
    );
  }

  const headerRow = sheet.getRow(HEADER_ROW);
  const headers = SCHEDULE_HEADERS.map((_, index) => headerRow.getCell(FIRST_HEADER_COLUMN + index).text);
  if (headers.some((header, index) => header !== SCHEDULE_HEADERS[index])) {
    throw mismatch(
      templatePath,
      `Didn't find the expected table headers in row ${HEADER_ROW}. Expected ` +
        `${SCHEDULE_HEADERS.map((h) => `"${h}"`).join(', ')}, instead got ${headers.map((h) => `"${h}"`).join(', ')}`
    );
  }

  return sheet;
}

/**
 * A workbook with the regulator layout, for runs without a template
 */
export function createBlankScheduleWorkbook(): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SCHEDULE_SHEET_NAME);

  sheet.getCell(EARLIEST_DATE_CAPTION_CELL).value = EARLIEST_DATE_CAPTION;

  const headerRow = sheet.getRow(HEADER_ROW);
  SCHEDULE_HEADERS.forEach((header, index) => {
    headerRow.getCell(FIRST_HEADER_COLUMN + index).value = header;
  });
  headerRow.font = { bold: true };

  for (let item = 1; item <= MAX_ROWS; item++) {
    sheet.getCell(`B${FIRST_SCHEDULE_ROW + item - 1}`).value = item;
  }

  sheet.columns.forEach((column) => {
    column.width = 15;
  });

  return workbook;
}

export async function loadTemplateWorkbook(templatePath: string): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(templatePath);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    throw new ScheduleError({
      code: code === 'ENOENT' ? 'FILE_NOT_FOUND' : 'TEMPLATE_MISMATCH',
      message: `Cannot open schedule template ${templatePath}: ${(error as Error).message}`,
      suggestion: 'Check that templatePath points at an .xlsx copy of the Gift Aid schedule spreadsheet.',
      cause: error instanceof Error ? error : undefined,
      context: { templatePath },
    });
  }
  checkScheduleWorkbook(workbook, templatePath);
  return workbook;
}

/**
 * Write one page's donations into the schedule worksheet
 */
export function fillSchedulePage(sheet: ExcelJS.Worksheet, page: SchedulePage): void {
  const earliest = sheet.getCell(EARLIEST_DATE_CELL);
  earliest.value = toUtcDate(page.earliestDate);
  earliest.numFmt = DATE_FORMAT;

  for (const row of page.rows) {
    const declaration = row.declaration;
    if (declaration) {
      sheet.getCell(`C${row.sheetRow}`).value = declaration.title;
      sheet.getCell(`D${row.sheetRow}`).value = declaration.firstName;
      sheet.getCell(`E${row.sheetRow}`).value = declaration.lastName;
      sheet.getCell(`F${row.sheetRow}`).value = declaration.houseNameOrNumber;
      sheet.getCell(`G${row.sheetRow}`).value = declaration.postcode;
    }

    const date = sheet.getCell(`J${row.sheetRow}`);
    date.value = toUtcDate(row.transaction.date);
    date.numFmt = DATE_FORMAT;

    const amount = sheet.getCell(`K${row.sheetRow}`);
    amount.value = toPounds(row.transaction.amount);
    amount.numFmt = AMOUNT_FORMAT;
  }
}

/**
 * Render one page as .xlsx bytes, from the template when one is given
 */
export async function renderSchedulePage(page: SchedulePage, templatePath?: string): Promise<Buffer> {
  const workbook = templatePath
    ? await loadTemplateWorkbook(templatePath)
    : createBlankScheduleWorkbook();

  const [sheet] = workbook.worksheets;
  if (!sheet) {
    throw new ScheduleError({
      code: 'TEMPLATE_MISMATCH',
      message: 'Schedule workbook has no worksheet',
    });
  }

  fillSchedulePage(sheet, page);

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
