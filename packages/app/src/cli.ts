#!/usr/bin/env node

/**
 * CLI entry point for the daybook command
 */

// Load environment variables from .env file
import 'dotenv/config';

import { attachGlobalHandlers, createLogger } from '@daybook/logger';
import { runCli } from './program.js';

attachGlobalHandlers(createLogger({ level: 'error' }));

process.exitCode = await runCli(process.argv.slice(2));
