/**
 * Per-run output directories.
 * Each run gets a new directory named after the day it ran; later runs on
 * the same day get a "_(n)" suffix.
 */

import { mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { ScheduleError, formatIsoDate, type CalendarDate } from '@giftaid/core';

const NUMBERED_RUN = /^output_\d{4}-\d{2}-\d{2}_\((\d+)\)$/;

/** Give up after this many lost races for the same name */
const MAX_CREATE_ATTEMPTS = 5;

/**
 * Name for the next run directory, given the names already in the outputs directory
 */
export function nextRunDirectoryName(existing: readonly string[], day: CalendarDate): string {
  const base = `output_${formatIsoDate(day)}`;
  if (!existing.includes(base)) {
    return base;
  }

  let highest = 0;
  for (const name of existing) {
    if (!name.startsWith(base)) continue;
    const match = NUMBERED_RUN.exec(name);
    if (match) {
      highest = Math.max(highest, Number(match[1]));
    }
  }
  return `${base}_(${highest + 1})`;
}

export function today(): CalendarDate {
  const now = new Date();
  return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}

async function listOutputsDir(outputsDir: string): Promise<string[]> {
  try {
    return await readdir(outputsDir);
  } catch (error) {
    throw new ScheduleError({
      code: 'OUTPUT_DIRECTORY_FAILED',
      message: `Cannot list outputs directory ${outputsDir}: ${(error as Error).message}`,
      suggestion: 'Check that the outputs directory is a readable directory.',
      cause: error instanceof Error ? error : undefined,
      context: { outputsDir },
    });
  }
}

/**
 * Create the run directory. Never reuses an existing directory.
 */
export async function createRunDirectory(outputsDir: string, day: CalendarDate): Promise<string> {
  try {
    await mkdir(outputsDir, { recursive: true });
  } catch (error) {
    throw new ScheduleError({
      code: 'OUTPUT_DIRECTORY_FAILED',
      message: `Cannot create outputs directory ${outputsDir}: ${(error as Error).message}`,
      suggestion: 'Check that the outputs directory is writable.',
      cause: error instanceof Error ? error : undefined,
      context: { outputsDir },
    });
  }

  for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
    const name = nextRunDirectoryName(await listOutputsDir(outputsDir), day);
    const directory = join(outputsDir, name);
    try {
      await mkdir(directory);
      return directory;
    } catch (error) {
      // another run took the name between readdir and mkdir
      if ((error as NodeJS.ErrnoException).code === 'EEXIST') continue;
      throw new ScheduleError({
        code: 'OUTPUT_DIRECTORY_FAILED',
        message: `Cannot create run directory ${directory}: ${(error as Error).message}`,
        suggestion: 'Check that the outputs directory is writable.',
        cause: error instanceof Error ? error : undefined,
        context: { directory },
      });
    }
  }

  throw new ScheduleError({
    code: 'OUTPUT_DIRECTORY_FAILED',
    message: `Could not claim a new run directory in ${outputsDir} after ${MAX_CREATE_ATTEMPTS} attempts`,
    suggestion: 'Make sure only one run writes to the outputs directory at a time.',
    context: { outputsDir },
  });
}
