import { parseArgs } from 'node:util';
import { ScheduleError } from '@giftaid/core';
import { SCHEDULE_FORMATS, type ScheduleFormat } from '@giftaid/schedule-writer';

export const USAGE = [
  'Usage: gift-aid-schedule [--output=<excel|libre>] [--config <path>] [--input-dir <dir>] [--outputs-dir <dir>]',
  '',
  'Reads transactions.csv and declarations.csv from the input directory (default: the current directory)',
  'and writes a new run directory under the outputs directory (default: <input-dir>/outputs).',
  '',
  'Options:',
  '  --output=<excel|libre>  Office suite the schedule is prepared for (default: libre)',
  '  --config <path>         JSON config file',
  '  --input-dir <dir>       Directory holding transactions.csv and declarations.csv',
  '  --outputs-dir <dir>     Directory that receives one output_YYYY-MM-DD directory per run',
  '  -h, --help              Show this message',
].join('\n');

export interface CliArguments {
  output?: ScheduleFormat;
  configPath?: string;
  inputDir?: string;
  outputsDir?: string;
  help: boolean;
}

function usageError(message: string): ScheduleError {
  return new ScheduleError({
    code: 'USAGE_ERROR',
    message,
    suggestion: 'Run gift-aid-schedule --help to see the supported options.',
  });
}

function isScheduleFormat(value: string): value is ScheduleFormat {
  return SCHEDULE_FORMATS.some((format) => format === value);
}

function readOptions(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        output: { type: 'string' },
        config: { type: 'string' },
        'input-dir': { type: 'string' },
        'outputs-dir': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw usageError((error as Error).message);
  }
}

export function parseArguments(argv: readonly string[]): CliArguments {
  const values = readOptions(argv);

  const output = values.output;
  if (output !== undefined && !isScheduleFormat(output)) {
    throw usageError(`Unexpected spreadsheet type "${output}", expected either "excel" or "libre".`);
  }

  return {
    output,
    configPath: values.config,
    inputDir: values['input-dir'],
    outputsDir: values['outputs-dir'],
    help: values.help ?? false,
  };
}
