/**
 * Runtime-agnostic process utilities.
 * Wraps process.argv, process.cwd and process.env.
 */

export function cwd(): string {
  return process.cwd();
}

export function args(): string[] {
  return process.argv.slice(2);
}

export function envObject(): Record<string, string | undefined> {
  return process.env;
}
