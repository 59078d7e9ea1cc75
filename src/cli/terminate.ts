import chalk from 'chalk';

import type { Grammar, OptionValue } from './grammar';
import type { ParseOutcome } from './parseGrammar';
import { formatHelp, formatUsage } from './usage';

export const USAGE_ERROR_EXIT_CODE = 2;

/**
 * Prints the usage line and the error, then terminates the process.
 * Usage errors are never recovered from.
 */
export function exitWithUsageError(grammar: Grammar, message: string): never {
  console.error(formatUsage(grammar));
  console.error(`${grammar.prog}: ${chalk.red(`error: ${message}`)}`);
  process.exit(USAGE_ERROR_EXIT_CODE);
}

/**
 * Turns help, version and error outcomes into process exits; hands back the
 * parsed values otherwise.
 */
export function settleParseOutcome(
  grammar: Grammar,
  outcome: ParseOutcome,
): { values: Record<string, OptionValue>; rest: string[] } {
  switch (outcome.kind) {
    case 'help':
      console.log(formatHelp(grammar));
      process.exit(0);
    case 'version':
      console.log(grammar.version);
      process.exit(0);
    case 'error':
      return exitWithUsageError(grammar, outcome.message);
    case 'parsed':
      return { values: outcome.values, rest: outcome.rest };
  }
}
