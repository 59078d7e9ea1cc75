import type { EngineHost } from '@/engine/types';
import { logger } from '@/ui/logger';

import type { CommandContext, CommandRegistry } from './commandRegistry';
import { buildStrictGrammar, type CommandScope, type Grammar, type ProgramInfo } from './grammar';
import { parseLaunchArgs, type LaunchArgs } from './launchArgs';
import type { LaunchSession } from './session';
import { exitWithUsageError } from './terminate';

/** Audio and video driver overrides used when a command needs no display. */
export const HEADLESS_DRIVER_VARIABLES = ['SDL_AUDIODRIVER', 'SDL_VIDEODRIVER'] as const;
export const HEADLESS_DRIVER = 'dummy';

export type DispatcherDeps = Readonly<{
  registry: CommandRegistry;
  session: LaunchSession;
  host: EngineHost;
  /** The sanitized argument vector, program name first. */
  argv: readonly string[];
  env: NodeJS.ProcessEnv;
  program: ProgramInfo;
}>;

export type DispatchResult = {
  command: string;
  /** False when the handler finished the process' work. */
  proceed: boolean;
  /** The handler's strict-pass arguments, or the provisional ones if it never parsed. */
  args: LaunchArgs;
};

export class Dispatcher {
  constructor(private readonly deps: DispatcherDeps) {
    if (!deps.registry.isSealed) {
      throw new Error('Command registry must be sealed before a Dispatcher is created');
    }
  }

  /** `--lint` redirects the default command. */
  resolveCommand(provisional: LaunchArgs): string {
    if (provisional.command === 'run' && provisional.lint) {
      return 'lint';
    }
    return provisional.command;
  }

  strictGrammar(command: string, scope?: CommandScope): Grammar {
    return buildStrictGrammar(
      command,
      { ...this.deps.program, commandNames: this.deps.registry.names() },
      scope,
    );
  }

  dispatch(provisional: LaunchArgs): DispatchResult {
    const { registry, session, host, argv } = this.deps;
    const command = this.resolveCommand(provisional);

    const entry = registry.lookup(command);
    if (!entry) {
      exitWithUsageError(this.strictGrammar(command), `Command ${command} is unknown.`);
    }

    if (!entry.needsDisplay) {
      this.useHeadlessDrivers();
    }

    const parsed: { args: LaunchArgs | null } = { args: null };
    const context: CommandContext = {
      command,
      session,
      host,
      parseArgs: (scope) => {
        const { args } = parseLaunchArgs(this.strictGrammar(command, scope), argv.slice(1), session);
        parsed.args = args;
        return args;
      },
    };

    logger.debug(`[dispatch] Running command "${command}"`);
    const proceed = entry.handler(context);
    logger.debug(`[dispatch] Command "${command}" finished, proceed=${proceed}`);

    return { command, proceed, args: parsed.args ?? provisional };
  }

  private useHeadlessDrivers(): void {
    // An operator's explicit choice always wins.
    for (const variable of HEADLESS_DRIVER_VARIABLES) {
      if (this.deps.env[variable] === undefined) {
        this.deps.env[variable] = HEADLESS_DRIVER;
      }
    }
  }
}
