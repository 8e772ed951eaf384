// src/cli/args.ts

export type ParsedArgs = {
  command: string;
  flags: Record<string, string>;
  positional: string[];
};

/**
 * Minimal argv parsing: "<command> [--flag value | --flag=value | --switch] [positional...]".
 * A flag followed by another flag (or nothing) is read as "true".
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [command = "help", ...rest] = argv;
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf("=");
    if (eq >= 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }

    const next = rest[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags[body] = next;
      i++;
    } else {
      flags[body] = "true";
    }
  }

  return { command, flags, positional };
}

export function flagInt(flags: Record<string, string>, name: string, defaultValue: number): number {
  const v = flags[name];
  if (v === undefined) return defaultValue;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`--${name} must be an integer, got "${v}"`);
  return n;
}
