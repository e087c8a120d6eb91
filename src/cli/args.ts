/**
 * `--key=value` / `--flag` argument parsing shared by the CLI scripts
 */

export type ParsedArgs = {
  flags: Record<string, string | true>;
  positional: string[];
};

export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const flags: Record<string, string | true> = {};
  const positional: string[] = [];

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const key = arg.slice(2, eq === -1 ? undefined : eq);
      flags[key] = eq === -1 ? true : arg.slice(eq + 1);
    } else {
      positional.push(arg);
    }
  }

  return { flags, positional };
}

export function stringFlag(args: ParsedArgs, key: string): string | undefined {
  const value = args.flags[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function booleanFlag(args: ParsedArgs, key: string): boolean {
  const value = args.flags[key];
  if (value === undefined) return false;
  if (value === true) return true;
  return !['0', 'false', 'no'].includes(value.toLowerCase());
}
