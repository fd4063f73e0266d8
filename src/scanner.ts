// Recursive video file scanner
// Walks a directory tree and keeps the video files whose path contains every keyword.

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { ScanError } from './errors.ts';
import { getLogger } from './logging.ts';
import { containsMatch } from './filter.ts';

const logger = getLogger('Scanner');

/**
 * Recognized video extensions (lowercase, with leading dot)
 */
export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv',
  '.webm', '.m4v', '.mpg', '.mpeg', '.3gp', '.ogv',
]);

/**
 * Extension of the final path element, from its last dot (empty if none).
 * `clip.MP4` gives `.MP4`; a bare `.mp4` gives `.mp4`.
 */
export function getExtension(path: string): string {
  const slash = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  const name = path.slice(slash + 1);
  const dot = name.lastIndexOf('.');
  return dot === -1 ? '' : name.slice(dot);
}

export function isVideoFile(path: string): boolean {
  return VIDEO_EXTENSIONS.has(getExtension(path).toLowerCase());
}

/**
 * True when every keyword occurs in the path, ignoring case. No keywords match everything.
 */
export function matchesKeywords(path: string, keywords: readonly string[]): boolean {
  return keywords.every(keyword => containsMatch(keyword, path));
}

export interface ScanOptions {
  /** Directory listing, replaceable in tests */
  readDir?: (path: string) => Promise<Dirent[]>;
}

const defaultReadDir = (path: string): Promise<Dirent[]> => readdir(path, { withFileTypes: true });

function compareNames(a: Dirent, b: Dirent): number {
  // UTF-8 byte order; UTF-16 comparison puts astral characters before U+E000..U+FFFF
  return Buffer.compare(Buffer.from(a.name), Buffer.from(b.name));
}

/**
 * Scan `root` for video files matching all `keywords`.
 *
 * Entries are visited depth-first in name order. Directories are descended
 * into but never returned; symbolic links are not followed. The first
 * unreadable directory aborts the scan with a ScanError.
 */
export async function scan(
  root: string,
  keywords: readonly string[],
  options: ScanOptions = {}
): Promise<string[]> {
  const readDir = options.readDir ?? defaultReadDir;
  const results: string[] = [];
  let directories = 0;
  let videos = 0;

  const walk = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readDir(dir);
    } catch (error) {
      throw ScanError.fromFsError(dir, error);
    }
    directories++;

    entries.sort(compareNames);

    for (const entry of entries) {
      const path = join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(path);
        continue;
      }

      if (!isVideoFile(path)) {
        continue;
      }
      videos++;

      if (matchesKeywords(path, keywords)) {
        results.push(path);
      }
    }
  };

  logger.info('Scan started', { root, keywords });
  try {
    await walk(root);
  } catch (error) {
    if (error instanceof ScanError) {
      logger.error('Scan failed', error, { root, path: error.path });
    }
    throw error;
  }
  logger.info('Scan finished', { root, directories, videos, matches: results.length });

  return results;
}
