#!/usr/bin/env node
/**
 * Push Assistant - 主程式進入點
 *
 * Usage:
 *   push-assistant run [--config <path>] [--schedule <id>] [--dry-run]
 *   push-assistant daemon [--config <path>] [--dry-run]
 */

import { config } from 'dotenv';
import { configureLogging, createLogger } from './utils/logger.js';
import { detectEnvironment, loggingConfigFor } from './core/env-detect.js';
import { createProgram } from './interfaces/cli.js';

config();

const env = detectEnvironment();
configureLogging(loggingConfigFor(env));

createProgram(env.configPath)
  .parseAsync(process.argv)
  .catch((error) => {
    createLogger('Main').error('Fatal error:', error);
    process.exit(1);
  });
