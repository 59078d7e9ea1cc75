import type { CommandContext } from '@/cli/commandRegistry';

import { takesNoArguments } from './takesNoArguments';

export function handleQuitCommand(context: CommandContext): boolean {
  takesNoArguments(context, 'Quits without doing anything.');
  return false;
}
