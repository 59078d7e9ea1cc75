import type { CommandContext } from '@/cli/commandRegistry';
import type { ValueOption } from '@/cli/grammar';

export const LINT_OPTIONS: readonly ValueOption[] = [
  {
    kind: 'flag',
    flags: ['--error-code'],
    dest: 'errorCode',
    help: 'If given, the exit status is 0 when the project has no lint problems, and 1 when it has.',
  },
];

export function handleLintCommand(context: CommandContext): boolean {
  const args = context.parseArgs({
    description: 'Checks the project for likely errors.',
    options: LINT_OPTIONS,
  });
  context.host.runLint(args);
  return false;
}
