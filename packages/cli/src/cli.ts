#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   gift-aid-schedule [--output=<excel|libre>] [--config <path>]
 */

import { main } from './main.js';

process.exitCode = await main(process.argv.slice(2));
