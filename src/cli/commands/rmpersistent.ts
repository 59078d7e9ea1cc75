import type { CommandContext } from '@/cli/commandRegistry';

import { takesNoArguments } from './takesNoArguments';

export function handleRmpersistentCommand(context: CommandContext): boolean {
  const args = takesNoArguments(context, 'Deletes the persistent data.');
  context.host.unlinkPersistent(args);
  context.host.updateSettings({ savePersistent: false });
  return false;
}
