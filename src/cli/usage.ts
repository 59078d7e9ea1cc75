import { allOptions, type Grammar, type OptionSpec, type PositionalSpec } from './grammar';

const HELP_COLUMN = 24;

function metavarOf(option: OptionSpec): string | null {
  if (option.kind !== 'string' && option.kind !== 'int') return null;
  return option.metavar ?? option.dest.toUpperCase();
}

function usageTerm(option: OptionSpec): string {
  const metavar = metavarOf(option);
  return metavar ? `[${option.flags[0]} ${metavar}]` : `[${option.flags[0]}]`;
}

function positionalTerm(positional: PositionalSpec): string {
  return positional.required ? positional.name : `[${positional.name}]`;
}

function invocation(option: OptionSpec): string {
  const metavar = metavarOf(option);
  return option.flags.map((flag) => (metavar ? `${flag} ${metavar}` : flag)).join(', ');
}

function helpLine(term: string, help: string | undefined): string {
  const indented = `  ${term}`;
  if (!help) return indented;
  if (indented.length <= HELP_COLUMN - 2) {
    return indented.padEnd(HELP_COLUMN) + help;
  }
  return `${indented}\n${' '.repeat(HELP_COLUMN)}${help}`;
}

function visible(options: readonly OptionSpec[]): OptionSpec[] {
  return options.filter((option) => !option.hidden);
}

export function formatUsage(grammar: Grammar): string {
  const terms = [
    grammar.prog,
    ...visible(allOptions(grammar)).map(usageTerm),
    ...grammar.positionals.map(positionalTerm),
  ];
  return `usage: ${terms.join(' ')}`;
}

export function formatHelp(grammar: Grammar): string {
  const sections: string[] = [formatUsage(grammar), grammar.description];

  if (grammar.positionals.length > 0) {
    sections.push(
      ['positional arguments:', ...grammar.positionals.map((p) => helpLine(p.name, p.help))].join('\n'),
    );
  }

  const ungrouped = visible(grammar.options);
  if (ungrouped.length > 0) {
    sections.push(['options:', ...ungrouped.map((o) => helpLine(invocation(o), o.help))].join('\n'));
  }

  for (const group of grammar.groups) {
    const options = visible(group.options);
    if (options.length === 0 && !group.description) continue;

    const lines = [`${group.title}:`];
    if (group.description) {
      lines.push(`  ${group.description}`);
      if (options.length > 0) lines.push('');
    }
    lines.push(...options.map((o) => helpLine(invocation(o), o.help)));
    sections.push(lines.join('\n'));
  }

  return sections.join('\n\n');
}
