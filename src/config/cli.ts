// CLI argument parser driven by schema.json

import { ConfigError } from '../errors.ts';
import { schema, type ConfigProperty } from './schema.ts';

export interface ParsedCliFlags {
  flags: Record<string, unknown>;
  remaining: string[];
}

/**
 * Parse CLI arguments based on schema flag definitions.
 * Unknown `--` arguments and positional arguments are returned in `remaining`;
 * a bare `--` ends flag parsing.
 */
export function parseCliFlags(args: readonly string[]): ParsedCliFlags {
  const flags: Record<string, unknown> = {};
  const remaining: string[] = [];

  // Build a map of flag -> { path, prop } for quick lookup
  const flagMap = new Map<string, { path: string; prop: ConfigProperty }>();
  for (const [path, prop] of Object.entries(schema.properties)) {
    if (prop.flag) {
      flagMap.set(prop.flag, { path, prop });
    }
  }

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    // Check for --flag=value syntax
    const eqIndex = arg.indexOf('=');
    let flagName: string;
    let flagValue: string | undefined;

    if (eqIndex > 0 && arg.startsWith('--')) {
      flagName = arg.substring(0, eqIndex);
      flagValue = arg.substring(eqIndex + 1);
    } else {
      flagName = arg;
      flagValue = undefined;
    }

    const entry = flagMap.get(flagName);
    if (entry) {
      const { path, prop } = entry;

      if (prop.type === 'boolean') {
        // Boolean flags: presence means true (or false if inverted)
        flags[path] = !prop.flagInverted;
      } else {
        if (flagValue === undefined) {
          if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
            flagValue = args[i + 1];
            i++;
          } else {
            const enumHint = prop.enum ? ` [${prop.enum.join('|')}]` : '';
            throw new ConfigError(`${flagName} requires a value${enumHint}`);
          }
        }

        flags[path] = parseValue(flagName, flagValue, prop);
      }
    } else {
      remaining.push(arg);
    }

    i++;
  }

  return { flags, remaining };
}

/**
 * Parse a string value to the appropriate type based on schema
 */
export function parseValue(source: string, value: string, prop: ConfigProperty): unknown {
  switch (prop.type) {
    case 'boolean':
      return value === 'true' || value === '1';
    default:
      if (prop.enum) {
        const normalized = value.toUpperCase();
        const match = prop.enum.find(option => option.toUpperCase() === normalized);
        if (match === undefined) {
          throw new ConfigError(`Invalid value for ${source}: ${value} [${prop.enum.join('|')}]`);
        }
        return match;
      }
      return value;
  }
}

/**
 * Generate compact help for CLI flags only (for --help)
 */
export function generateFlagHelp(): string {
  const lines: string[] = [];

  lines.push('Options:');

  const flagEntries: Array<{ flag: string; prop: ConfigProperty }> = [];
  for (const prop of Object.values(schema.properties)) {
    if (prop.flag) {
      flagEntries.push({ flag: prop.flag, prop });
    }
  }

  flagEntries.sort((a, b) => a.flag.localeCompare(b.flag));

  for (const { flag, prop } of flagEntries) {
    let flagStr = flag;
    if (prop.type !== 'boolean') {
      flagStr += ' <value>';
    }

    const desc = prop.description || '';
    const envNote = prop.env ? ` (env: ${prop.env})` : '';

    lines.push(`  ${flagStr.padEnd(22)} ${desc}${envNote}`);
  }

  return lines.join('\n');
}

/**
 * Generate environment variable reference
 */
export function generateEnvVarHelp(): string {
  const lines: string[] = [];

  lines.push('Environment Variables:');

  const envEntries: Array<{ env: string; prop: ConfigProperty }> = [];
  for (const prop of Object.values(schema.properties)) {
    if (prop.env) {
      envEntries.push({ env: prop.env, prop });
    }
  }

  envEntries.sort((a, b) => a.env.localeCompare(b.env));

  for (const { env, prop } of envEntries) {
    const desc = prop.description || '';
    let typeInfo = '';
    if (prop.enum) {
      typeInfo = ` [${prop.enum.join('|')}]`;
    } else if (prop.type === 'boolean') {
      typeInfo = ' [true|false|1|0]';
    }

    const defaultStr = prop.default !== undefined ? ` (default: ${String(prop.default)})` : '';
    const invertedNote = prop.envInverted ? ' [set to disable]' : '';

    lines.push(`  ${env}`);
    lines.push(`    ${desc}${typeInfo}${defaultStr}${invertedNote}`);
  }

  return lines.join('\n');
}
