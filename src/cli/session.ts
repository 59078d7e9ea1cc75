/**
 * State that survives from the bootstrap pass into every dispatch of a process.
 */
export type LaunchSession = {
  /** Set when the engine restarts in-process; suppresses a full recompile. */
  reload: boolean;
  /** Set by the engine when the next start must recompile the scripts. */
  compileRequested: boolean;
  /** Set once a warp target has been handed to the engine. */
  warped: boolean;
  /** Tokens removed because a foreign launcher injected them, kept for inspection. */
  launcherArgs: string[] | null;
};

export function createLaunchSession(): LaunchSession {
  return {
    reload: false,
    compileRequested: false,
    warped: false,
    launcherArgs: null,
  };
}
