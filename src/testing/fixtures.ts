import { vi } from 'vitest';

import type { CommandRegistry } from '@/cli/commandRegistry';
import { buildLenientGrammar, defaultValues, type OptionValue, type ProgramInfo } from '@/cli/grammar';
import { toLaunchArgs, type LaunchArgs } from '@/cli/launchArgs';
import type { LaunchSession } from '@/cli/session';
import type { EngineHost, EngineSettings, StartOutcome } from '@/engine/types';

export const TEST_PROGRAM: ProgramInfo = { prog: 'vnlaunch', version: '1.2.3' };

export class ProcessExit extends Error {
  constructor(public readonly code: number) {
    super(`process.exit(${code})`);
  }
}

/** Makes process.exit throw so the exit path can be asserted. */
export function mockProcessExit() {
  return vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new ProcessExit(Number(code ?? 0));
  });
}

export function makeLaunchArgs(overrides: Record<string, OptionValue> = {}): LaunchArgs {
  const grammar = buildLenientGrammar({ ...TEST_PROGRAM, commandNames: [] });
  return toLaunchArgs({ ...defaultValues(grammar), ...overrides });
}

export class FakeEngineHost implements EngineHost {
  public readonly version = TEST_PROGRAM.version;
  public readonly settingsPatches: Partial<EngineSettings>[] = [];
  public readonly lintCalls: LaunchArgs[] = [];
  public readonly unlinkCalls: LaunchArgs[] = [];
  public readonly startCalls: Array<{ args: LaunchArgs; reload: boolean; compileRequested: boolean }> = [];
  public registerCommands?: (registry: CommandRegistry) => void;

  constructor(private readonly outcomes: StartOutcome[] = []) {}

  updateSettings(patch: Partial<EngineSettings>): void {
    this.settingsPatches.push(patch);
  }

  runLint(args: LaunchArgs): void {
    this.lintCalls.push(args);
  }

  unlinkPersistent(args: LaunchArgs): void {
    this.unlinkCalls.push(args);
  }

  start(args: LaunchArgs, session: LaunchSession): StartOutcome {
    this.startCalls.push({ args, reload: session.reload, compileRequested: session.compileRequested });
    return this.outcomes.shift() ?? { kind: 'quit', exitCode: 0 };
  }
}
