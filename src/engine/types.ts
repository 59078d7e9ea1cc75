import type { CommandRegistry } from '@/cli/commandRegistry';
import type { LaunchArgs } from '@/cli/launchArgs';
import type { LaunchSession } from '@/cli/session';

export type EngineSettings = {
  /** Report how long each frame takes to draw. */
  profileDisplay: boolean;
  /** Log the contents of the image cache. */
  debugImageCache: boolean;
  /** `file:line` to fast-forward to once the game starts. */
  warpSpec: string | null;
  /** Cleared after the persistent data was deleted so it is not written back. */
  savePersistent: boolean;
};

export type StartOutcome =
  | { kind: 'quit'; exitCode: number }
  | { kind: 'reload'; compile: boolean };

/**
 * The engine subsystems the launcher drives. Their internals live elsewhere;
 * the launcher only calls through this interface.
 */
export interface EngineHost {
  readonly version: string;
  updateSettings(patch: Partial<EngineSettings>): void;
  runLint(args: LaunchArgs): void;
  unlinkPersistent(args: LaunchArgs): void;
  /** Called after the built-in commands are registered; may add or replace commands. */
  registerCommands?(registry: CommandRegistry): void;
  /** Normal startup. A reload asks the launcher to dispatch again in the same process. */
  start(args: LaunchArgs, session: LaunchSession): StartOutcome;
}
