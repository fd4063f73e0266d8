// Resolved configuration for vidpick
//
// Priority order (lowest to highest):
// 1. Schema defaults
// 2. Env vars
// 3. CLI flags (explicit user intent)
//
// There is no configuration file. The environment is passed in explicitly so
// nothing here reads process-wide state.

import { ConfigError } from '../errors.ts';
import { isLogLevel, type LogLevel } from '../logging.ts';
import { getDefaultLogFile } from '../xdg.ts';
import { parseValue } from './cli.ts';
import { schema, type ConfigProperty } from './schema.ts';

export type ConfigSource = 'default' | 'env' | 'cli';

export const DEFAULT_PLAYER = 'mpv';

/**
 * Initialization options for VidpickConfig
 */
export interface ConfigInitOptions {
  env?: Record<string, string | undefined>;
  cliFlags?: Record<string, unknown>;
}

export class VidpickConfig {
  readonly videoDir: string;
  readonly player: string;
  readonly logLevel: LogLevel;
  /** Empty string when logging is disabled */
  readonly logFile: string;
  readonly alternateScreen: boolean;
  readonly syncRendering: boolean;

  private readonly _sources: Record<string, ConfigSource>;

  private constructor(data: Record<string, unknown>, sources: Record<string, ConfigSource>, env: Record<string, string | undefined>) {
    this._sources = sources;

    const videoDir = data['videoDir'];
    if (typeof videoDir !== 'string' || videoDir === '') {
      throw new ConfigError('VIDEO_DIR environment variable is required');
    }
    this.videoDir = videoDir;

    const player = data['player'];
    this.player = typeof player === 'string' && player !== '' ? player : DEFAULT_PLAYER;

    const level = data['log.level'];
    this.logLevel = typeof level === 'string' && isLogLevel(level) ? level : 'INFO';

    const logFile = data['log.file'];
    this.logFile = typeof logFile === 'string' ? logFile : getDefaultLogFile(env);

    this.alternateScreen = data['terminal.alternateScreen'] !== false;
    this.syncRendering = data['terminal.syncRendering'] !== false;
  }

  /**
   * Resolve every schema property from CLI flags, env vars and defaults.
   * Throws ConfigError when a value is invalid or VIDEO_DIR is missing.
   */
  static resolve(options: ConfigInitOptions = {}): VidpickConfig {
    const env = options.env ?? {};
    const cliFlags = options.cliFlags ?? {};
    const data: Record<string, unknown> = {};
    const sources: Record<string, ConfigSource> = {};

    for (const [path, prop] of Object.entries(schema.properties)) {
      const { value, source } = resolveValue(path, prop, env, cliFlags);
      data[path] = value;
      sources[path] = source;
    }

    return new VidpickConfig(data, sources, env);
  }

  /**
   * Where a property's value came from
   */
  getSource(path: string): ConfigSource | undefined {
    return this._sources[path];
  }
}

function resolveValue(
  path: string,
  prop: ConfigProperty,
  env: Record<string, string | undefined>,
  cliFlags: Record<string, unknown>
): { value: unknown; source: ConfigSource } {
  // 1. CLI flag (already typed by parseCliFlags)
  if (prop.flag && cliFlags[path] !== undefined) {
    return { value: cliFlags[path], source: 'cli' };
  }

  // 2. Env var
  if (prop.env) {
    const envVal = env[prop.env];
    if (envVal !== undefined) {
      const parsed = parseValue(prop.env, envVal, prop);
      return { value: prop.envInverted ? !parsed : parsed, source: 'env' };
    }
  }

  // 3. Default from schema
  return { value: prop.default, source: 'default' };
}
