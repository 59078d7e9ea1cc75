import { z } from 'zod';

import type { Grammar, OptionValue } from './grammar';
import { parseGrammar } from './parseGrammar';
import type { LaunchSession } from './session';
import { settleParseOutcome } from './terminate';

/** Commands whose whole purpose needs freshly compiled scripts. */
export const COMPILE_COMMANDS: ReadonlySet<string> = new Set(['compile', 'add_from', 'merge_strings']);

const LaunchArgsSchema = z.object({
  basedir: z.string(),
  command: z.string(),
  savedir: z.string().nullable(),
  trace: z.number().int(),
  compile: z.boolean(),
  compilePython: z.boolean(),
  keepOrphanRpyc: z.boolean(),
  lint: z.boolean(),
  errorsInEditor: z.boolean(),
  safeMode: z.boolean(),
  warp: z.string().nullable(),
  jsonDump: z.string().nullable(),
  jsonDumpPrivate: z.boolean(),
  jsonDumpCommon: z.boolean(),
});

type GlobalArgs = z.infer<typeof LaunchArgsSchema>;

export type LaunchArgs = Readonly<
  GlobalArgs & {
    /** Values of the options the active command declared for its strict pass. */
    extras: Readonly<Record<string, OptionValue>>;
  }
>;

const GLOBAL_KEYS: ReadonlySet<string> = new Set(Object.keys(LaunchArgsSchema.shape));

export function toLaunchArgs(values: Record<string, OptionValue>): LaunchArgs {
  const parsed = LaunchArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new Error(`Parsed values do not match the launch grammar: ${parsed.error.message}`);
  }

  const extras: Record<string, OptionValue> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!GLOBAL_KEYS.has(key)) extras[key] = value;
  }

  return Object.freeze({ ...parsed.data, extras: Object.freeze(extras) });
}

/**
 * Applied after every successful parse. The order matters: a reload turns
 * compilation off, and a compile command or an explicit request turns it back on.
 */
export function applyCompileOverrides(args: LaunchArgs, session: LaunchSession): LaunchArgs {
  let compile = args.compile;

  if (session.reload) {
    compile = false;
  }
  if (COMPILE_COMMANDS.has(args.command)) {
    compile = true;
  }
  if (session.compileRequested) {
    compile = true;
  }

  return compile === args.compile ? args : Object.freeze({ ...args, compile });
}

export type LaunchParse = {
  args: LaunchArgs;
  rest: string[];
};

/**
 * Parses tokens with a launch grammar and applies the post-processing.
 * Help, version and usage errors terminate the process.
 */
export function parseLaunchArgs(grammar: Grammar, tokens: readonly string[], session: LaunchSession): LaunchParse {
  const { values, rest } = settleParseOutcome(grammar, parseGrammar(grammar, tokens));
  return { args: applyCompileOverrides(toLaunchArgs(values), session), rest };
}
