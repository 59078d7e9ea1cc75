import type { CommandContext } from '@/cli/commandRegistry';

import { takesNoArguments } from './takesNoArguments';

/** The compile flag is already forced on by the post-processing of every parse. */
export function handleCompileCommand(context: CommandContext): boolean {
  takesNoArguments(context, 'Recompiles the game script.');
  return false;
}
