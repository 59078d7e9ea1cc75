import { afterEach, describe, expect, it, vi } from 'vitest';

import { mockProcessExit, ProcessExit, TEST_PROGRAM } from '@/testing/fixtures';
import { logger } from '@/ui/logger';

import { bootstrapArgs } from './bootstrap';
import { createLaunchSession } from './session';

vi.mock('@/ui/logger', () => ({
  logger: {
    debug: vi.fn(),
    debugLargeJson: vi.fn(),
  },
}));

afterEach(() => {
  vi.restoreAllMocks();
});

function bootstrap(argv: string[], session = createLaunchSession()) {
  return bootstrapArgs({ argv, session, program: TEST_PROGRAM });
}

describe('bootstrapArgs', () => {
  it('defaults to the run command with no base directory', () => {
    const { args, unknown } = bootstrap(['vnlaunch']);

    expect(args.command).toBe('run');
    expect(args.basedir).toBe('');
    expect(args.lint).toBe(false);
    expect(unknown).toEqual([]);
  });

  it('logs the provisional arguments', () => {
    const { args } = bootstrap(['vnlaunch', 'mygame']);

    expect(logger.debugLargeJson).toHaveBeenCalledWith('[bootstrap] Provisional arguments:', args);
  });

  it('forces the lint flag for the lint command', () => {
    const { args } = bootstrap(['vnlaunch', 'mygame', 'lint']);

    expect(args.command).toBe('lint');
    expect(args.lint).toBe(true);
  });

  it('returns command-specific tokens instead of failing on them', () => {
    const { args, unknown } = bootstrap(['vnlaunch', 'mygame', 'run', '--profile-display', '--trace', '1']);

    expect(args.basedir).toBe('mygame');
    expect(args.trace).toBe(1);
    expect(unknown).toEqual(['--profile-display']);
  });

  it('sanitizes before parsing', () => {
    const session = createLaunchSession();
    const argv = ['vnlaunch', '-EpicApp=StoryGame', '--trace', '2'];

    const { args, sanitized } = bootstrap(argv, session);

    expect(sanitized.kind).toBe('foreign-launcher');
    expect(argv).toEqual(['vnlaunch']);
    expect(args.trace).toBe(0);
    expect(args.command).toBe('run');
    expect(session.launcherArgs).toEqual(['-EpicApp=StoryGame', '--trace', '2']);
  });

  it('applies the compile post-processing', () => {
    expect(bootstrap(['vnlaunch', 'mygame', 'compile']).args.compile).toBe(true);

    const reloading = { ...createLaunchSession(), reload: true };
    expect(bootstrap(['vnlaunch', 'mygame', 'run', '--compile'], reloading).args.compile).toBe(false);
  });

  it('exits after printing the version', () => {
    const exit = mockProcessExit();
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(() => bootstrap(['vnlaunch', '--version', 'mygame'])).toThrow(ProcessExit);
    expect(exit).toHaveBeenCalledWith(0);
    expect(log).toHaveBeenCalledWith('1.2.3');
  });

  it('still exits on a malformed value', () => {
    mockProcessExit();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => bootstrap(['vnlaunch', '--trace', 'verbose'])).toThrow(new ProcessExit(2));
    expect(errors.mock.calls[1][0]).toContain("error: argument --trace: invalid int value: 'verbose'");
  });
});
