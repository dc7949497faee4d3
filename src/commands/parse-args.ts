/**
 * CLI Argument Parsing
 *
 * Splits argv into a command and --flag values, then maps flags onto the
 * argument objects the report runner validates.
 */

export interface ParsedArgs {
  command: string;
  flags: Record<string, string>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let flagStart = 1;

  // "help growth" → "help-growth"
  const topic = args[1];
  if (command === 'help' && topic !== undefined && !topic.startsWith('--')) {
    command = `help-${topic}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};

  for (let i = flagStart; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('--')) continue;
    const key = arg.slice(2);
    const next = args[i + 1];
    // Boolean flags have no value; value flags take the next token
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = '';
    }
  }

  return { command, flags };
}

/**
 * Convert flags to report arguments. Lists are comma-separated; numbers are
 * passed through as numbers so validation reports them precisely.
 */
export function flagsToReportArgs(flags: Record<string, string>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const key of ['source', 'measure'] as const) {
    const value = flags[key];
    if (value) result[key] = value;
  }

  for (const key of ['states', 'categories'] as const) {
    const value = flags[key];
    if (value) result[key] = splitList(value);
  }

  const limit = flags['limit'];
  if (limit !== undefined) {
    result['limit'] = limit === '' ? limit : Number(limit);
  }

  return result;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}
