/** Value of --name=value or --name value; null when absent. */
export function readFlag(argv: string[], name: string): string | null {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
    if (arg === `--${name}`) {
      const next = argv[i + 1];
      return next !== undefined && !next.startsWith("--") ? next : "";
    }
  }
  return null;
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.some((a) => a === `--${name}` || a.startsWith(`--${name}=`));
}

/** Fold recognised flags into an env-shaped overrides object. */
export function flagsToEnv(argv: string[], mapping: Record<string, string>): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [flag, envKey] of Object.entries(mapping)) {
    const value = readFlag(argv, flag);
    if (value !== null && value !== "") {
      overrides[envKey] = value;
    }
  }
  return overrides;
}
