import { afterEach, describe, expect, it, vi } from 'vitest';

import { bootstrapArgs } from '@/cli/bootstrap';
import { Dispatcher } from '@/cli/dispatch';
import { createLaunchSession, type LaunchSession } from '@/cli/session';
import { FakeEngineHost, mockProcessExit, ProcessExit, TEST_PROGRAM } from '@/testing/fixtures';

import { buildCommandRegistry } from './index';

vi.mock('@/ui/logger', () => ({
  logger: {
    debug: vi.fn(),
    debugLargeJson: vi.fn(),
  },
}));

afterEach(() => {
  vi.restoreAllMocks();
});

function dispatch(argv: string[], options: { host?: FakeEngineHost; session?: LaunchSession; env?: NodeJS.ProcessEnv } = {}) {
  const host = options.host ?? new FakeEngineHost();
  const session = options.session ?? createLaunchSession();
  const env = options.env ?? {};
  const provisional = bootstrapArgs({ argv, session, program: TEST_PROGRAM }).args;
  const dispatcher = new Dispatcher({
    registry: buildCommandRegistry(host),
    session,
    host,
    argv,
    env,
    program: TEST_PROGRAM,
  });
  return { host, session, env, result: dispatcher.dispatch(provisional) };
}

describe('buildCommandRegistry', () => {
  it('registers the built-in commands and seals the registry', () => {
    const registry = buildCommandRegistry(new FakeEngineHost());

    expect(registry.names()).toEqual(['compile', 'lint', 'quit', 'rmpersistent', 'run']);
    expect(registry.lookup('run')?.needsDisplay).toBe(true);
    expect(registry.lookup('lint')?.needsDisplay).toBe(false);
    expect(registry.isSealed).toBe(true);
  });

  it('lets the engine add and replace commands', () => {
    const host = new FakeEngineHost();
    const replacement = () => false;
    host.registerCommands = (registry) => {
      registry.register('run', replacement, true);
      registry.register('add_from', () => false);
    };

    const registry = buildCommandRegistry(host);

    expect(registry.lookup('run')?.handler).toBe(replacement);
    expect(registry.names()).toContain('add_from');
  });
});

describe('run command', () => {
  it('continues startup and keeps the display drivers', () => {
    const { result, env } = dispatch(['vnlaunch', 'mygame', 'run']);

    expect(result).toMatchObject({ command: 'run', proceed: true });
    expect(result.args.basedir).toBe('mygame');
    expect(env).toEqual({});
  });

  it('accepts its own flags without positionals', () => {
    const { result, host } = dispatch(['vnlaunch', '--profile-display', '--debug-image-cache']);

    expect(result.proceed).toBe(true);
    expect(result.args.extras).toEqual({ profileDisplay: true, debugImageCache: true });
    expect(host.settingsPatches).toEqual([{ profileDisplay: true }, { debugImageCache: true }]);
  });

  it('hands the warp target to the engine once per session', () => {
    const session = createLaunchSession();
    const host = new FakeEngineHost();
    const argv = ['vnlaunch', 'mygame', 'run', '--warp', 'script.rpy:10'];

    dispatch([...argv], { host, session });
    dispatch([...argv], { host, session });

    expect(session.warped).toBe(true);
    expect(host.settingsPatches).toEqual([{ warpSpec: 'script.rpy:10' }]);
  });

  it('rejects flags it does not declare', () => {
    mockProcessExit();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => dispatch(['vnlaunch', 'mygame', 'run', '--no-such-flag'])).toThrow(new ProcessExit(2));
    expect(errors.mock.calls[1][0]).toContain('error: unrecognized arguments: --no-such-flag');
  });
});

describe('lint command', () => {
  it('runs when named as the command', () => {
    const { result, host, env } = dispatch(['vnlaunch', 'mygame', 'lint', '--error-code']);

    expect(result).toMatchObject({ command: 'lint', proceed: false });
    expect(host.lintCalls).toHaveLength(1);
    expect(host.lintCalls[0].extras).toEqual({ errorCode: true });
    expect(env).toEqual({ SDL_AUDIODRIVER: 'dummy', SDL_VIDEODRIVER: 'dummy' });
  });

  it('runs instead of run when --lint is given', () => {
    const { result, host } = dispatch(['vnlaunch', 'mygame', 'run', '--lint']);

    expect(result.command).toBe('lint');
    expect(host.lintCalls).toHaveLength(1);
    expect(host.lintCalls[0].command).toBe('run');
    expect(host.lintCalls[0].lint).toBe(true);
    expect(host.startCalls).toEqual([]);
  });
});

describe('compile command', () => {
  it('stops after forcing compilation', () => {
    const { result } = dispatch(['vnlaunch', 'mygame', 'compile']);

    expect(result.proceed).toBe(false);
    expect(result.args.compile).toBe(true);
  });
});

describe('rmpersistent command', () => {
  it('deletes the persistent data and disables saving it', () => {
    const { result, host } = dispatch(['vnlaunch', 'mygame', 'rmpersistent', '--savedir', '/tmp/saves']);

    expect(result.proceed).toBe(false);
    expect(host.unlinkCalls).toHaveLength(1);
    expect(host.unlinkCalls[0].savedir).toBe('/tmp/saves');
    expect(host.settingsPatches).toEqual([{ savePersistent: false }]);
  });
});

describe('quit command', () => {
  it('stops without touching the engine', () => {
    const { result, host } = dispatch(['vnlaunch', 'mygame', 'quit']);

    expect(result.proceed).toBe(false);
    expect(host.settingsPatches).toEqual([]);
    expect(host.lintCalls).toEqual([]);
  });

  it('rejects stray arguments', () => {
    mockProcessExit();
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => dispatch(['vnlaunch', 'mygame', 'quit', 'now'])).toThrow(new ProcessExit(2));
  });
});
