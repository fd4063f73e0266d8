// XDG Base Directory Specification support
// https://specifications.freedesktop.org/basedir/latest/

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_NAME = 'vidpick';

type EnvSource = Record<string, string | undefined>;

/**
 * Get the home directory, with Windows fallback
 */
function getHomeDir(env: EnvSource): string {
  return env.HOME || env.USERPROFILE || homedir() || '.';
}

/**
 * Get the XDG cache directory for user-specific non-essential cached data.
 *
 * Default: $HOME/.cache/vidpick
 */
export function getCacheDir(env: EnvSource = process.env): string {
  const baseDir = env.XDG_CACHE_HOME || join(getHomeDir(env), '.cache');
  return join(baseDir, APP_NAME);
}

/**
 * Default log file: <cache dir>/logs/vidpick.log
 */
export function getDefaultLogFile(env: EnvSource = process.env): string {
  return join(getCacheDir(env), 'logs', 'vidpick.log');
}
