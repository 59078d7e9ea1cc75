import type { CommandContext } from '@/cli/commandRegistry';
import type { LaunchArgs } from '@/cli/launchArgs';

/**
 * Strict-parses the command line with no command-specific options, so stray
 * arguments to an argument-less command are reported as usage errors.
 */
export function takesNoArguments(context: CommandContext, description?: string): LaunchArgs {
  return context.parseArgs({ description });
}
