/**
 * @giftaid/cli
 *
 * Command line entry point for building Gift Aid schedules.
 */

export { main, exitCodeFor, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './main.js';
export type { MainOptions } from './main.js';
export { parseArguments, USAGE } from './arguments.js';
export type { CliArguments } from './arguments.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfigFile,
  parseConfig,
  resolveRunSettings,
} from './config.js';
export type { ConfigFile, RunSettings, SettingOverrides } from './config.js';
export { Logger, createRunId, redactPersonalData } from './logger.js';
export type { LogFormat, LogLevel, LogSink, LoggerOptions } from './logger.js';
export { runScheduleBuilder, formatCompletionMessage } from './run.js';
export type { RunOutcome } from './run.js';
