/**
 * Zod schemas for one row of each input table.
 * Every cell is checked independently so one row can yield several issues.
 */

import { z } from 'zod';
import {
  isValidPostcode,
  parseAmount,
  parseUkDate,
  suggestPostcode,
} from '@giftaid/core';
import type { DeclarationColumnKey, TransactionColumnKey } from './table-spec.js';

const ukDate = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const date = parseUkDate(value);
    if (!date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: value === '' ? 'No date provided' : 'Not a valid date',
      });
      return z.NEVER;
    }
    return date;
  });

const validityFlag = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === '1') return true;
    if (value === '0') return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Validity flags must be exactly "0" or "1"',
    });
    return z.NEVER;
  });

const postcode = z
  .string()
  .trim()
  .min(1, 'No postcode provided')
  .superRefine((value, ctx) => {
    if (value === '' || isValidPostcode(value)) return;
    const suggestion = suggestPostcode(value);
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: suggestion
        ? `Invalid postcode, did you mean "${suggestion}"?`
        : 'Invalid postcode',
    });
  });

export const declarationRowSchema = z.object({
  title: z.string().trim().max(4, 'Title should be no longer than four characters'),
  firstName: z
    .string()
    .trim()
    .min(1, 'No first name provided')
    .max(35, 'First name is longer than 35 characters, please shorten it'),
  lastName: z
    .string()
    .trim()
    .min(1, 'No last name provided')
    .max(35, 'Last name is longer than 35 characters, please shorten it')
    .refine(
      (value) => !value.includes('-'),
      (value) => ({
        message: `Double-barrelled last names should have a space instead of a hyphen, use "${value.replace(/-/g, ' ')}"`,
      })
    ),
  houseNameOrNumber: z
    .string()
    .trim()
    .min(1, 'No house number (or name) provided')
    .max(40, 'House name is longer than 40 characters, please shorten it'),
  postcode,
  declarationDate: ukDate,
  fourYearsBefore: validityFlag,
  dayOfDeclaration: validityFlag,
  afterDayOfDeclaration: validityFlag,
  identifier: z.string().trim().min(1, 'No identifier provided'),
} satisfies { [K in DeclarationColumnKey]: z.ZodTypeAny });

export const transactionRowSchema = z.object({
  date: ukDate,
  // kept verbatim: the matcher sees exactly what the bank wrote
  reference: z.string(),
  amount: z.string().transform((value, ctx) => {
    const result = parseAmount(value);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.reason });
      return z.NEVER;
    }
    return result.amount;
  }),
} satisfies { [K in TransactionColumnKey]: z.ZodTypeAny });

export type DeclarationRowOutput = z.output<typeof declarationRowSchema>;
export type TransactionRowOutput = z.output<typeof transactionRowSchema>;
