// Command-line entry: configuration, scan, interactive browse, playback

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as dotenvParse } from 'dotenv';
import packageJson from '../package.json' with { type: 'json' };
import { VideoBrowser } from './browser.ts';
import { generateEnvVarHelp, generateFlagHelp, parseCliFlags, VidpickConfig } from './config/mod.ts';
import { ConfigError, isVidpickError, PlaybackError, ScanError, UIError } from './errors.ts';
import { createLogger, getLogger, resetGlobalLogger, setGlobalLogger, type Logger } from './logging.ts';
import { launchPlayer } from './player.ts';
import { cwd as processCwd, envObject, stderr as processStderr, stdout as processStdout } from './runtime/mod.ts';
import { scan } from './scanner.ts';
import { runBrowserSession } from './session.ts';
import { ensureError } from './utils/error.ts';

const logger = getLogger('Main');

export const VERSION: string = packageJson.version;

export const USAGE = 'Usage: vidpick <search keywords...>';
export const EXAMPLE = 'Example: vidpick matrix 1999';

export interface Writer {
  write(chunk: string): unknown;
}

/**
 * Collaborators of main(), replaceable in tests.
 */
export interface MainDeps {
  env?: Record<string, string | undefined>;
  cwd?: string;
  stdout?: Writer;
  stderr?: Writer;
  /** Load .env/.env.local from cwd (default true) */
  loadEnvFiles?: boolean;
  scan?: typeof scan;
  runSession?: typeof runBrowserSession;
  launch?: typeof launchPlayer;
}

const ACTION_FLAGS = new Set(['--help', '-h', '--version', '-V', '--print']);

/**
 * Load environment variables from .env files using dotenv.
 * Variables already set are never overridden; later files do not override earlier ones.
 */
export function loadDotenvFiles(dir: string, env: Record<string, string | undefined>): string[] {
  const loaded: string[] = [];
  for (const envFile of ['.env', '.env.local']) {
    const envPath = join(dir, envFile);
    if (!existsSync(envPath)) {
      continue;
    }
    let parsed: Record<string, string>;
    try {
      parsed = dotenvParse(readFileSync(envPath));
    } catch (error) {
      throw new ConfigError(`Cannot load ${envPath}: ${ensureError(error).message}`);
    }
    for (const [name, value] of Object.entries(parsed)) {
      if (env[name] === undefined) {
        env[name] = value;
      }
    }
    loaded.push(envPath);
  }
  return loaded;
}

export function generateHelp(): string {
  return [
    `vidpick ${VERSION} - find a video by keywords and play it`,
    '',
    USAGE,
    EXAMPLE,
    '',
    '  --print                Print the matches and exit without the browser',
    '  --help, -h             Show this help',
    '  --version, -V          Show the version',
    '',
    generateFlagHelp(),
    '',
    generateEnvVarHelp(),
    '',
  ].join('\n');
}

/**
 * Message shown for a fatal error, prefixed by the stage that failed.
 */
export function describeError(error: unknown): string {
  if (error instanceof ScanError) {
    return `Error searching videos: ${error.message}`;
  }
  if (error instanceof UIError) {
    return `Error running UI: ${error.message}`;
  }
  if (error instanceof PlaybackError) {
    return `Error playing video: ${error.message}`;
  }
  if (isVidpickError(error)) {
    return error.message;
  }
  return `Unexpected error: ${ensureError(error).message}`;
}

/**
 * Run vidpick with the given arguments. Returns the process exit code.
 */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const env = deps.env ?? envObject();
  const out = deps.stdout ?? processStdout;
  const err = deps.stderr ?? processStderr;
  let fileLogger: Logger | undefined;

  try {
    if (deps.loadEnvFiles ?? true) {
      loadDotenvFiles(deps.cwd ?? processCwd(), env);
    }

    // Everything after a bare -- is a keyword, even if it looks like an option
    const separator = argv.indexOf('--');
    const optionArgs = separator === -1 ? argv : argv.slice(0, separator);
    const literalKeywords = separator === -1 ? [] : argv.slice(separator + 1);

    const { flags, remaining } = parseCliFlags(optionArgs);
    const actions = new Set(remaining.filter(arg => ACTION_FLAGS.has(arg)));
    const positional = remaining.filter(arg => !ACTION_FLAGS.has(arg));

    if (actions.has('--help') || actions.has('-h')) {
      out.write(generateHelp());
      return 0;
    }
    if (actions.has('--version') || actions.has('-V')) {
      out.write(`vidpick ${VERSION}\n`);
      return 0;
    }

    const unknown = positional.find(arg => arg.startsWith('--'));
    if (unknown) {
      throw new ConfigError(`Unknown option: ${unknown} (use -- before keywords that start with --)`);
    }
    const keywords = [...positional, ...literalKeywords];

    const config = VidpickConfig.resolve({ env, cliFlags: flags });

    fileLogger = createLogger({ logFile: config.logFile, level: config.logLevel });
    setGlobalLogger(fileLogger);
    logger.info('Configuration resolved', {
      videoDir: config.videoDir,
      player: config.player,
      playerSource: config.getSource('player'),
    });

    if (keywords.length === 0) {
      err.write(`${USAGE}\n${EXAMPLE}\n`);
      return 1;
    }

    out.write(`Searching for videos matching: ${keywords.join(' ')}\n`);

    const videos = await (deps.scan ?? scan)(config.videoDir, keywords);

    if (videos.length === 0) {
      out.write('No videos found matching your search.\n');
      return 0;
    }

    if (actions.has('--print')) {
      out.write(videos.map(video => `${video}\n`).join(''));
      return 0;
    }

    const browser = new VideoBrowser(videos);
    const selection = await (deps.runSession ?? runBrowserSession)(browser, {
      videoDir: config.videoDir,
      alternateScreen: config.alternateScreen,
      syncRendering: config.syncRendering,
    });

    if (selection !== null) {
      out.write(`Playing: ${selection}\n`);
      await (deps.launch ?? launchPlayer)(config.player, selection);
    }

    return 0;
  } catch (error) {
    logger.error('Fatal error', ensureError(error));
    err.write(`${describeError(error)}\n`);
    return isVidpickError(error) ? error.exitCode : 1;
  } finally {
    if (fileLogger) {
      fileLogger.close();
      if (fileLogger.writeError) {
        err.write(`Warning: logging stopped: ${fileLogger.writeError.message}\n`);
      }
      resetGlobalLogger();
    }
  }
}
