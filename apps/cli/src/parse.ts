/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax; everything else is positional.
 */

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function positionals(args: string[]): string[] {
  return args.filter((arg) => !arg.startsWith("--"));
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** An option's value, else the environment variable, else an error naming both. */
export function requireArg(kv: Record<string, string>, key: string, envVar: string): string {
  const val = kv[key] ?? process.env[envVar];
  if (!val) {
    throw new Error(`Missing required argument: --${key} (or set ${envVar})`);
  }
  return val;
}
