#!/usr/bin/env node
/**
 * SQLBatcher CLI entry point
 */

import { runCli } from './commands.js';

const exitCode = await runCli(process.argv.slice(2));
process.exitCode = exitCode;
