import { z } from 'zod';

import type { CommandContext } from '@/cli/commandRegistry';
import type { ValueOption } from '@/cli/grammar';
import { logger } from '@/ui/logger';

export const RUN_OPTIONS: readonly ValueOption[] = [
  {
    kind: 'flag',
    flags: ['--profile-display'],
    dest: 'profileDisplay',
    help: 'If present, the engine will report the amount of time it takes to draw the screen.',
  },
  {
    kind: 'flag',
    flags: ['--debug-image-cache'],
    dest: 'debugImageCache',
    help: 'If present, the engine will log information regarding the contents of the image cache.',
  },
];

const RunOptionsSchema = z.object({
  profileDisplay: z.boolean(),
  debugImageCache: z.boolean(),
});

/**
 * The default command: leads to normal game startup.
 */
export function handleRunCommand(context: CommandContext): boolean {
  const args = context.parseArgs({
    description: 'Runs the current project normally.',
    options: RUN_OPTIONS,
    requireCommand: false,
  });
  const options = RunOptionsSchema.parse(args.extras);

  // A warp applies to the first start only, not to later reloads.
  if (args.warp && !context.session.warped) {
    context.session.warped = true;
    context.host.updateSettings({ warpSpec: args.warp });
    logger.debug(`[run] Warping to ${args.warp}`);
  }

  if (options.profileDisplay) {
    context.host.updateSettings({ profileDisplay: true });
  }

  if (options.debugImageCache) {
    context.host.updateSettings({ debugImageCache: true });
  }

  return true;
}
