/**
 * Argument helpers shared by CLI commands.
 */

/**
 * Value following `--name`, or undefined when the flag is absent or last.
 */
export function getFlagValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index < 0 || index + 1 >= args.length) return undefined;
  return args[index + 1];
}

/**
 * Arguments with the given value-taking flags (and their values) and
 * boolean flags removed.
 */
export function positionalArgs(
  args: string[],
  valueFlags: string[],
  booleanFlags: string[] = [],
): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
      continue;
    }
    if (booleanFlags.includes(args[i])) continue;
    result.push(args[i]);
  }
  return result;
}

export function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : fallback;
}
