/**
 * Schedule Engine
 *
 * Runs the matcher over every transaction and hands the outcomes to the
 * scheduler. Holds no state between runs.
 */

import type { Declaration, Transaction } from '@giftaid/core';
import { matchAll } from '../matching/index.js';
import { buildSchedule } from '../scheduling/index.js';
import type { MatchOptions, ScheduleOptions, ScheduleReport } from '../types/index.js';

export interface ScheduleEngineOptions {
  matching?: MatchOptions;
  schedule?: ScheduleOptions;
}

export class ScheduleEngine {
  constructor(private readonly options: ScheduleEngineOptions = {}) {}

  build(
    transactions: readonly Transaction[],
    declarations: readonly Declaration[]
  ): ScheduleReport {
    const matched = matchAll(transactions, declarations, this.options.matching);
    return buildSchedule(matched, this.options.schedule);
  }
}
