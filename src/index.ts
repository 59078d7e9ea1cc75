#!/usr/bin/env node

/**
 * CLI entry point for the vnlaunch command
 *
 * Simple argument parsing without any CLI framework dependencies
 */

import chalk from 'chalk';

import { configuration } from '@/configuration';
import { createLocalEngineHost } from '@/engine/localEngineHost';
import { runLauncher } from '@/launcher/runLauncher';
import { logger } from '@/ui/logger';

try {
  const exitCode = runLauncher({
    argv: process.argv.slice(1),
    env: process.env,
    host: createLocalEngineHost(),
  });
  if (exitCode !== 0) {
    process.exitCode = exitCode;
  }
} catch (error) {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error');
  if (configuration.isDebug) {
    console.error(error);
    console.error(chalk.gray(`Debug log: ${logger.getLogPath()}`));
  }
  process.exit(1);
}
