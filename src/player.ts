// External media player launch

import { PlaybackError } from './errors.ts';
import { getLogger } from './logging.ts';
import { Command, type CommandStatus, type SpawnFn } from './runtime/mod.ts';
import { ensureError } from './utils/error.ts';

const logger = getLogger('Player');

export interface LaunchOptions {
  /** Replaces child_process.spawn (tests) */
  spawn?: SpawnFn;
}

/**
 * Run `player <path>` in the foreground with inherited stdio and wait for it.
 * The path is passed as one literal argument, never through a shell.
 */
export async function launchPlayer(player: string, path: string, options: LaunchOptions = {}): Promise<void> {
  const command = new Command(player, { args: [path] }, options.spawn);

  logger.info('Launching player', { player, path });

  let status: CommandStatus;
  try {
    status = await command.status();
  } catch (error) {
    const cause = ensureError(error);
    logger.error('Player failed to start', cause, { player });
    throw new PlaybackError(`failed to start ${player}: ${cause.message}`, player, null, null, cause);
  }

  if (status.signal) {
    logger.error('Player terminated by signal', undefined, { player, signal: status.signal });
    throw new PlaybackError(`${player} was terminated by ${status.signal}`, player, null, status.signal);
  }

  if (!status.success) {
    logger.error('Player exited with failure', undefined, { player, code: status.code });
    throw new PlaybackError(`${player} exited with status ${status.code}`, player, status.code);
  }

  logger.info('Player finished', { player });
}
