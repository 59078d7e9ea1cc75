import {
  allOptions,
  defaultValues,
  type Grammar,
  type OptionSpec,
  type OptionValue,
} from './grammar';

export type ParseOutcome =
  | { kind: 'parsed'; values: Record<string, OptionValue>; rest: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

const NEGATIVE_NUMBER = /^-\d+$|^-\d*\.\d+$/;
const INT_VALUE = /^[-+]?\d+$/;

function looksLikeOption(token: string): boolean {
  return token.startsWith('-') && token !== '-' && !NEGATIVE_NUMBER.test(token);
}

type Resolution =
  | { kind: 'match'; option: OptionSpec; flag: string }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'unknown' };

function resolveOption(options: readonly OptionSpec[], flag: string): Resolution {
  for (const option of options) {
    if (option.flags.includes(flag)) {
      return { kind: 'match', option, flag };
    }
  }

  // Unique prefixes of long options are accepted, e.g. --safe for --safe-mode.
  if (!flag.startsWith('--') || flag.length <= 2) {
    return { kind: 'unknown' };
  }
  const matches: Array<{ option: OptionSpec; flag: string }> = [];
  for (const option of options) {
    for (const candidate of option.flags) {
      if (candidate.startsWith('--') && candidate.startsWith(flag)) {
        matches.push({ option, flag: candidate });
      }
    }
  }
  if (matches.length === 1) {
    return { kind: 'match', option: matches[0].option, flag: matches[0].flag };
  }
  if (matches.length > 1) {
    return { kind: 'ambiguous', candidates: matches.map((m) => m.flag) };
  }
  return { kind: 'unknown' };
}

/**
 * Parses tokens (program name already removed) against a grammar.
 *
 * Never prints and never exits; the caller decides what a help request or an
 * error means. Lenient grammars return unrecognized tokens in `rest`.
 */
export function parseGrammar(grammar: Grammar, tokens: readonly string[]): ParseOutcome {
  const options = allOptions(grammar);
  const values = defaultValues(grammar);
  const positionals: string[] = [];
  // Unknown options and surplus positionals, in command-line order.
  const rest: string[] = [];
  let optionsEnded = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (optionsEnded || !looksLikeOption(token)) {
      if (positionals.length < grammar.positionals.length) {
        positionals.push(token);
      } else {
        rest.push(token);
      }
      continue;
    }
    if (token === '--') {
      optionsEnded = true;
      continue;
    }

    let flag = token;
    let inlineValue: string | undefined;
    const eq = token.indexOf('=');
    if (token.startsWith('--') && eq > 2) {
      flag = token.slice(0, eq);
      inlineValue = token.slice(eq + 1);
    }

    const resolution = resolveOption(options, flag);
    if (resolution.kind === 'ambiguous') {
      return { kind: 'error', message: `ambiguous option: ${flag} could match ${resolution.candidates.join(', ')}` };
    }
    if (resolution.kind === 'unknown') {
      rest.push(token);
      continue;
    }

    const { option } = resolution;
    const name = option.flags.join('/');

    switch (option.kind) {
      case 'help':
        return { kind: 'help' };
      case 'version':
        return { kind: 'version' };
      case 'flag':
        if (inlineValue !== undefined) {
          return { kind: 'error', message: `argument ${name}: ignored explicit argument '${inlineValue}'` };
        }
        values[option.dest] = true;
        break;
      case 'string':
      case 'int': {
        let raw = inlineValue;
        if (raw === undefined) {
          const next = tokens[i + 1];
          if (next === undefined || looksLikeOption(next)) {
            return { kind: 'error', message: `argument ${name}: expected one argument` };
          }
          raw = next;
          i++;
        }
        if (option.kind === 'int') {
          if (!INT_VALUE.test(raw.trim())) {
            return { kind: 'error', message: `argument ${name}: invalid int value: '${raw}'` };
          }
          values[option.dest] = Number.parseInt(raw.trim(), 10);
        } else {
          values[option.dest] = raw;
        }
        break;
      }
    }
  }

  const missing: string[] = [];
  grammar.positionals.forEach((positional, index) => {
    const value = positionals[index];
    if (value !== undefined) {
      values[positional.name] = value;
    } else if (positional.required) {
      missing.push(positional.name);
    }
  });
  if (missing.length > 0) {
    return { kind: 'error', message: `the following arguments are required: ${missing.join(', ')}` };
  }

  if (grammar.mode === 'strict' && rest.length > 0) {
    return { kind: 'error', message: `unrecognized arguments: ${rest.join(' ')}` };
  }

  return { kind: 'parsed', values, rest };
}
