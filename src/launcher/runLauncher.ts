import { bootstrapArgs } from '@/cli/bootstrap';
import { buildCommandRegistry } from '@/cli/commands';
import { Dispatcher } from '@/cli/dispatch';
import type { ProgramInfo } from '@/cli/grammar';
import { createLaunchSession, type LaunchSession } from '@/cli/session';
import { configuration } from '@/configuration';
import type { EngineHost } from '@/engine/types';
import { logger } from '@/ui/logger';

export type LauncherParams = Readonly<{
  /** Program name followed by the user's tokens; sanitized in place. */
  argv: string[];
  env: NodeJS.ProcessEnv;
  host: EngineHost;
  session?: LaunchSession;
  program?: ProgramInfo;
}>;

/**
 * Sanitizes and bootstraps once, then dispatches until a command stops the
 * process or the engine quits. Returns the exit code.
 */
export function runLauncher(params: LauncherParams): number {
  const { argv, env, host } = params;
  const session = params.session ?? createLaunchSession();
  const program = params.program ?? { prog: configuration.programName, version: host.version };

  let provisional = bootstrapArgs({ argv, session, program }).args;

  for (;;) {
    const registry = buildCommandRegistry(host);
    const dispatcher = new Dispatcher({ registry, session, host, argv, env, program });
    const result = dispatcher.dispatch(provisional);

    if (!result.proceed) {
      return 0;
    }

    const outcome = host.start(result.args, session);
    if (outcome.kind === 'quit') {
      return outcome.exitCode;
    }

    logger.debug(`[launcher] Reloading, compile=${outcome.compile}`);
    session.reload = true;
    session.compileRequested = outcome.compile;
    provisional = result.args;
  }
}
