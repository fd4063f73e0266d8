// ANSI escape codes for terminal control

export const ANSI = {
  clearScreen: '\x1b[2J',
  cursorHome: '\x1b[H',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
  alternateScreen: '\x1b[?1049h',
  normalScreen: '\x1b[?1049l',
  // Synchronized output sequences for reducing flicker
  beginSync: '\x1b[?2026h',     // Begin synchronized update (DEC Private Mode 2026)
  endSync: '\x1b[?2026l',       // End synchronized update
  reverse: '\x1b[7m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
};

/**
 * Wrap text in reverse video.
 */
export function reverse(text: string): string {
  return `${ANSI.reverse}${text}${ANSI.reset}`;
}

export function dim(text: string): string {
  return `${ANSI.dim}${text}${ANSI.reset}`;
}
