import { logger } from '@/ui/logger';

import { buildLenientGrammar, type ProgramInfo } from './grammar';
import { parseLaunchArgs, type LaunchArgs } from './launchArgs';
import { sanitizeLauncherArgs, type SanitizeResult } from './sanitizeLauncherArgs';
import type { LaunchSession } from './session';

export type BootstrapResult = {
  /** Provisional: replaced by the strict pass once commands are registered. */
  args: LaunchArgs;
  /** Tokens the lenient grammar did not recognize; informational only. */
  unknown: string[];
  sanitized: SanitizeResult;
};

/**
 * First pass over the command line, run before any command is registered.
 * Extracts the global flags and leaves command-specific tokens for the strict pass.
 */
export function bootstrapArgs(params: {
  argv: string[];
  session: LaunchSession;
  program: ProgramInfo;
}): BootstrapResult {
  const { argv, session, program } = params;

  const sanitized = sanitizeLauncherArgs(argv, session);

  // Nothing is registered yet, so the help text has no command names to list.
  const grammar = buildLenientGrammar({ ...program, commandNames: [] });
  const { args, rest } = parseLaunchArgs(grammar, argv.slice(1), session);

  // lint is reachable both as a command and as --lint.
  const provisional: LaunchArgs = args.command === 'lint' && !args.lint
    ? Object.freeze({ ...args, lint: true })
    : args;

  logger.debugLargeJson('[bootstrap] Provisional arguments:', provisional);
  if (rest.length > 0) {
    logger.debug('[bootstrap] Deferred to the strict pass:', rest);
  }

  return { args: provisional, unknown: rest, sanitized };
}
