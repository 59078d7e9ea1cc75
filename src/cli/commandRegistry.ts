import type { EngineHost } from '@/engine/types';

import type { CommandScope } from './grammar';
import type { LaunchArgs } from './launchArgs';
import type { LaunchSession } from './session';

export type CommandContext = Readonly<{
  /** The resolved command name, after the lint redirect. */
  command: string;
  session: LaunchSession;
  host: EngineHost;
  /** Strict-parses argv for this command; the result replaces the provisional args. */
  parseArgs: (scope?: CommandScope) => LaunchArgs;
}>;

/** Returns true to continue normal startup, false to stop once it returns. */
export type CommandHandler = (context: CommandContext) => boolean;

export type CommandEntry = Readonly<{
  name: string;
  handler: CommandHandler;
  needsDisplay: boolean;
}>;

export class CommandRegistry {
  private readonly entries = new Map<string, CommandEntry>();
  private sealed = false;

  /** Stores the entry for `name`; a later registration of the same name wins. */
  register(name: string, handler: CommandHandler, needsDisplay = false): void {
    if (this.sealed) {
      throw new Error(`Cannot register command "${name}": registration has already ended`);
    }
    this.entries.set(name, Object.freeze({ name, handler, needsDisplay }));
  }

  lookup(name: string): CommandEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
