import { CommandRegistry } from '@/cli/commandRegistry';
import type { EngineHost } from '@/engine/types';

import { handleCompileCommand } from './compile';
import { handleLintCommand } from './lint';
import { handleQuitCommand } from './quit';
import { handleRmpersistentCommand } from './rmpersistent';
import { handleRunCommand } from './run';

export function registerBuiltinCommands(registry: CommandRegistry): void {
  registry.register('run', handleRunCommand, true);
  registry.register('lint', handleLintCommand);
  registry.register('compile', handleCompileCommand);
  registry.register('rmpersistent', handleRmpersistentCommand);
  registry.register('quit', handleQuitCommand);
}

/** Built-ins first, then whatever the engine adds or overrides, then sealed. */
export function buildCommandRegistry(host: EngineHost): CommandRegistry {
  const registry = new CommandRegistry();
  registerBuiltinCommands(registry);
  host.registerCommands?.(registry);
  registry.seal();
  return registry;
}
