// SPDX-License-Identifier: Apache-2.0
/**
 * Command-line flag parsing shared by service entry points.
 *
 * `argv` is the argument list after the executable and script path
 * (i.e. `process.argv.slice(2)`).
 *
 * Supports both --flag=value and --flag value forms.
 * For --flag value, argv[i+1] is consumed only when it does not start with "--".
 */

export function getFlag(name: string, argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(`--${name}=`)) return arg.slice(`--${name}=`.length);
    if (arg === `--${name}`) {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) return next;
      return ""; // boolean flag
    }
  }
  return undefined;
}

export function hasFlag(name: string, argv: readonly string[]): boolean {
  return argv.some((arg) => arg === `--${name}` || arg.startsWith(`--${name}=`));
}

/**
 * Resolve an option from its flag, then its environment variable.
 * An empty flag value counts as unset.
 */
export function resolveOption(
  flag: string,
  envVar: string,
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
): string | undefined {
  const fromFlag = getFlag(flag, argv);
  if (fromFlag) return fromFlag;
  const fromEnv = env[envVar];
  return fromEnv ? fromEnv : undefined;
}
