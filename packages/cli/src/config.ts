import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { MAX_ROWS, REFERENCE_NORMALIZATIONS, ScheduleError } from '@giftaid/core';
import type { MatchOptions, ScheduleOptions } from '@giftaid/schedule-core';
import { DEFAULT_SCHEDULE_FORMAT, SCHEDULE_FORMATS, type ScheduleFormat } from '@giftaid/schedule-writer';
import { LOG_FORMATS, LOG_LEVELS, type LoggerOptions } from './logger.js';

export const DEFAULT_TRANSACTIONS_FILE = 'transactions.csv';
export const DEFAULT_DECLARATIONS_FILE = 'declarations.csv';
export const DEFAULT_OUTPUTS_DIR = 'outputs';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends ScheduleError {
  constructor(message: string, suggestion?: string) {
    super({ code: 'CONFIGURATION_ERROR', message, suggestion });
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(
      `Missing required environment variable: ${name}`,
      `Set ${name}, or give a default in the config file as \${${name}:-value}.`
    );
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

// env expansion yields strings, so numeric and boolean settings accept them too
const integerSetting = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]).pipe(z.number().int());
const booleanSetting = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

export const configFileSchema = z
  .object({
    inputDir: z.string().min(1).optional(),
    transactionsFile: z.string().min(1).optional(),
    declarationsFile: z.string().min(1).optional(),
    outputsDir: z.string().min(1).optional(),
    output: z.enum(SCHEDULE_FORMATS).optional(),
    templatePath: z.string().min(1).optional(),
    matching: z
      .object({
        normalization: z.enum(REFERENCE_NORMALIZATIONS).optional(),
      })
      .strict()
      .optional(),
    schedule: z
      .object({
        maxRowsPerPage: integerSetting.pipe(z.number().min(1).max(MAX_ROWS)).optional(),
        maxPages: integerSetting.pipe(z.number().min(1)).optional(),
        enforceValidityWindows: booleanSetting.optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        format: z.enum(LOG_FORMATS).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error), 'Correct the listed settings in the config file.');
  }
  return result.data;
}

export async function loadConfigFile(
  configPath: string,
  options: EnvExpansionOptions & { cwd?: string } = {}
): Promise<ConfigFile> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${(error as Error).message}`,
      'Check the path given to --config.'
    );
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${(error as Error).message}`);
  }

  return parseConfig(parsed, options);
}

/** Command line settings that override the config file */
export interface SettingOverrides {
  output?: ScheduleFormat;
  inputDir?: string;
  outputsDir?: string;
}

/** Everything one run needs, with every path absolute */
export interface RunSettings {
  transactionsPath: string;
  declarationsPath: string;
  outputsDir: string;
  format: ScheduleFormat;
  templatePath?: string;
  matching: MatchOptions;
  schedule: ScheduleOptions;
  logging: Pick<LoggerOptions, 'level' | 'format'>;
}

/**
 * Merge config file and command line into run settings.
 * Relative paths resolve against `cwd`; the outputs directory defaults to "outputs" inside the input directory.
 */
export function resolveRunSettings(
  config: ConfigFile,
  overrides: SettingOverrides,
  cwd: string
): RunSettings {
  const inputDir = resolve(cwd, overrides.inputDir ?? config.inputDir ?? '.');
  const outputsDir = overrides.outputsDir ?? config.outputsDir;

  return {
    transactionsPath: resolve(inputDir, config.transactionsFile ?? DEFAULT_TRANSACTIONS_FILE),
    declarationsPath: resolve(inputDir, config.declarationsFile ?? DEFAULT_DECLARATIONS_FILE),
    outputsDir: outputsDir ? resolve(cwd, outputsDir) : resolve(inputDir, DEFAULT_OUTPUTS_DIR),
    format: overrides.output ?? config.output ?? DEFAULT_SCHEDULE_FORMAT,
    templatePath: config.templatePath ? resolve(cwd, config.templatePath) : undefined,
    matching: { normalization: config.matching?.normalization },
    schedule: {
      maxRowsPerPage: config.schedule?.maxRowsPerPage,
      maxPages: config.schedule?.maxPages,
      enforceValidityWindows: config.schedule?.enforceValidityWindows,
    },
    logging: { level: config.logging?.level, format: config.logging?.format },
  };
}
