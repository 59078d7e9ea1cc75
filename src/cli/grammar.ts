/**
 * Argument grammar for the launcher
 *
 * A grammar is plain frozen data: positionals, ungrouped options and titled
 * option groups. `parseGrammar` consumes it, `usage.ts` renders it. The global
 * flags are declared once and shared by the lenient bootstrap grammar and every
 * strict, command-scoped grammar.
 */

export type OptionValue = string | number | boolean | null;

type OptionBase = {
  /** Spellings, e.g. ['-h', '--help']. */
  readonly flags: readonly string[];
  readonly help?: string;
  /** Accepted by the parser, left out of the help text. */
  readonly hidden?: boolean;
};

export type FlagOption = OptionBase & { readonly kind: 'flag'; readonly dest: string };
export type StringOption = OptionBase & {
  readonly kind: 'string';
  readonly dest: string;
  readonly metavar?: string;
  readonly default: string | null;
};
export type IntOption = OptionBase & {
  readonly kind: 'int';
  readonly dest: string;
  readonly metavar?: string;
  readonly default: number;
};
export type VersionOption = OptionBase & { readonly kind: 'version' };
export type HelpOption = OptionBase & { readonly kind: 'help' };

export type ValueOption = FlagOption | StringOption | IntOption;
export type OptionSpec = ValueOption | VersionOption | HelpOption;

export type PositionalSpec = {
  readonly name: string;
  readonly required: boolean;
  readonly default: string;
  readonly help: string;
};

export type OptionGroup = {
  readonly title: string;
  readonly description?: string;
  readonly options: readonly OptionSpec[];
};

export type GrammarMode = 'lenient' | 'strict';

export type Grammar = {
  readonly prog: string;
  readonly description: string;
  readonly mode: GrammarMode;
  readonly version: string;
  readonly positionals: readonly PositionalSpec[];
  readonly options: readonly OptionSpec[];
  readonly groups: readonly OptionGroup[];
};

export type ProgramInfo = {
  readonly prog: string;
  readonly version: string;
};

export type GrammarEnv = ProgramInfo & {
  /** Names listed in the `command` help; taken from the command registry. */
  readonly commandNames: readonly string[];
};

export type CommandScope = {
  readonly description?: string;
  readonly options?: readonly ValueOption[];
  /** `run` keeps basedir and command optional even in its strict pass. */
  readonly requireCommand?: boolean;
};

export const ENGINE_DESCRIPTION = 'The vnlaunch visual novel engine.';

const BASEDIR_HELP =
  'The base directory containing the project to run. This defaults to the directory containing the launcher.';

function positionals(required: boolean, commandNames: readonly string[]): PositionalSpec[] {
  const names = [...commandNames].sort().join(', ');
  return [
    { name: 'basedir', required, default: '', help: BASEDIR_HELP },
    {
      name: 'command',
      required,
      default: 'run',
      help: `The command to execute. Available commands are: ${names}. Defaults to 'run'.`,
    },
  ];
}

function globalOptions(): OptionSpec[] {
  return [
    {
      kind: 'string',
      flags: ['--savedir'],
      dest: 'savedir',
      metavar: 'DIRECTORY',
      default: null,
      help: 'The directory where saves and persistent data are placed.',
    },
    {
      kind: 'int',
      flags: ['--trace'],
      dest: 'trace',
      metavar: 'LEVEL',
      default: 0,
      help: 'The level of trace the engine will log to trace.txt. (1=per-call, 2=per-line)',
    },
    { kind: 'version', flags: ['--version'], help: 'Displays the version of the engine in use.' },
    {
      kind: 'flag',
      flags: ['--compile'],
      dest: 'compile',
      help: 'Forces all scripts to be recompiled before proceeding.',
    },
    {
      kind: 'flag',
      flags: ['--compile-python'],
      dest: 'compilePython',
      help: 'Forces embedded script code to be recompiled, rather than read from the bytecode cache.',
    },
    {
      kind: 'flag',
      flags: ['--keep-orphan-rpyc'],
      dest: 'keepOrphanRpyc',
      help: 'Prevents the compile command from deleting orphan compiled files.',
    },
    { kind: 'flag', flags: ['--lint'], dest: 'lint', hidden: true },
    {
      kind: 'flag',
      flags: ['--errors-in-editor'],
      dest: 'errorsInEditor',
      help: 'Causes errors to open in a text editor.',
    },
    {
      kind: 'flag',
      flags: ['--safe-mode'],
      dest: 'safeMode',
      help: 'Forces the engine to start in safe mode, allowing the player to configure graphics.',
    },
    {
      kind: 'string',
      flags: ['--warp'],
      dest: 'warp',
      metavar: 'FILE:LINE',
      default: null,
      help: 'Tries to warp to the statement before the given line of the given file. Only valid with the run command.',
    },
  ];
}

function jsonDumpGroup(): OptionGroup {
  return {
    title: 'JSON dump arguments',
    description:
      'The engine can dump information about the game to a JSON file. These options let you select the file, and choose what is dumped.',
    options: [
      {
        kind: 'string',
        flags: ['--json-dump'],
        dest: 'jsonDump',
        metavar: 'FILE',
        default: null,
        help: 'The name of the JSON file.',
      },
      {
        kind: 'flag',
        flags: ['--json-dump-private'],
        dest: 'jsonDumpPrivate',
        help: 'Include private names. (Names beginning with _.)',
      },
      {
        kind: 'flag',
        flags: ['--json-dump-common'],
        dest: 'jsonDumpCommon',
        help: 'Include names defined in the common directory.',
      },
    ],
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Grammar for the bootstrap pass: optional positionals, no help flag, and
 * unknown tokens are handed back instead of rejected.
 */
export function buildLenientGrammar(env: GrammarEnv): Grammar {
  const grammar: Grammar = {
    prog: env.prog,
    description: ENGINE_DESCRIPTION,
    mode: 'lenient',
    version: env.version,
    positionals: positionals(false, env.commandNames),
    options: globalOptions(),
    groups: [jsonDumpGroup()],
  };
  return deepFreeze(grammar);
}

/**
 * Grammar for the strict pass of `forCommand`. Any token it does not declare
 * is a usage error.
 */
export function buildStrictGrammar(forCommand: string, env: GrammarEnv, scope: CommandScope = {}): Grammar {
  const help: HelpOption = { kind: 'help', flags: ['-h', '--help'], help: 'Displays this help message, then exits.' };

  const grammar: Grammar = {
    prog: env.prog,
    description: ENGINE_DESCRIPTION,
    mode: 'strict',
    version: env.version,
    positionals: positionals(scope.requireCommand ?? true, env.commandNames),
    options: [help, ...globalOptions()],
    groups: [
      jsonDumpGroup(),
      {
        title: `${forCommand} command arguments`,
        description: scope.description,
        options: [...(scope.options ?? [])],
      },
    ],
  };
  return deepFreeze(grammar);
}

export function allOptions(grammar: Grammar): OptionSpec[] {
  return [...grammar.options, ...grammar.groups.flatMap((group) => group.options)];
}

export function isValueOption(option: OptionSpec): option is ValueOption {
  return option.kind === 'flag' || option.kind === 'string' || option.kind === 'int';
}

export function defaultValues(grammar: Grammar): Record<string, OptionValue> {
  const values: Record<string, OptionValue> = {};
  for (const positional of grammar.positionals) {
    values[positional.name] = positional.default;
  }
  for (const option of allOptions(grammar)) {
    if (!isValueOption(option)) continue;
    values[option.dest] = option.kind === 'flag' ? false : option.default;
  }
  return values;
}
