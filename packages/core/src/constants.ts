/**
 * Regulator constants shared across packages
 */

/** Maximum number of donation rows one schedule workbook may hold */
export const MAX_ROWS = 1000;

/** Postcode value used for donors who live outside the UK */
export const NON_UK_POSTCODE = 'X';

/** First spreadsheet row of the donations table in the regulator template */
export const FIRST_SCHEDULE_ROW = 25;

/** Row number of the header row in every input table (data starts below it) */
export const HEADER_ROW_NUMBER = 1;
