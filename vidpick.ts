#!/usr/bin/env tsx
/**
 * # vidpick
 *
 * Find a video by keywords and play it.
 *
 * ```bash
 * export VIDEO_DIR=~/Videos
 * vidpick matrix 1999
 * ```
 *
 * Every keyword must occur in the file's path (case-insensitive). Matches open
 * in an interactive list: arrows or j/k to move, `/` to filter, Enter to play
 * in `$VIDEO_PLAYER` (default `mpv`), q to quit.
 *
 * Run `vidpick --help` for flags and environment variables.
 *
 * @module
 */

import { main } from './src/vidpick-main.ts';
import { args, stdout } from './src/runtime/mod.ts';
import { emergencyCleanupTerminal } from './src/terminal-lifecycle.ts';

main(args()).then(
  code => {
    process.exitCode = code;
  },
  error => {
    emergencyCleanupTerminal(stdout);
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
);
