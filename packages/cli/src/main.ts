import { ScheduleError, wrapError, type CalendarDate } from '@giftaid/core';
import { USAGE, parseArguments } from './arguments.js';
import { loadConfigFile, resolveRunSettings, type ConfigFile } from './config.js';
import { Logger, createRunId, type LogSink } from './logger.js';
import { formatCompletionMessage, runScheduleBuilder } from './run.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface MainOptions {
  stdout?: LogSink;
  stderr?: LogSink;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Day used to name the run directory */
  day?: CalendarDate;
}

export function exitCodeFor(error: ScheduleError): number {
  return error.code === 'USAGE_ERROR' || error.code === 'CONFIGURATION_ERROR' ? EXIT_USAGE : EXIT_FAILURE;
}

/**
 * Run the command line tool and return its exit code
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const cwd = options.cwd ?? process.cwd();
  let logger = new Logger({ sink: stderr });

  try {
    const args = parseArguments(argv);
    if (args.help) {
      stdout.write(`${USAGE}\n`);
      return EXIT_OK;
    }

    const config: ConfigFile = args.configPath
      ? await loadConfigFile(args.configPath, { cwd, env: options.env })
      : {};
    const settings = resolveRunSettings(config, args, cwd);
    logger = new Logger({ ...settings.logging, sink: stderr }).child({ runId: createRunId() });

    const outcome = await runScheduleBuilder(settings, logger, options.day);
    stdout.write(`${formatCompletionMessage(outcome)}\n`);
    return EXIT_OK;
  } catch (error) {
    const failure = wrapError(error);
    logger.error('Schedule build failed', { code: failure.code, context: failure.context });
    stderr.write(`${failure.toActionableMessage()}\n`);
    return exitCodeFor(failure);
  }
}
