// Screen rendering for the video browser
// The view is a pure function of a browser snapshot.

import { relative } from 'node:path';
import { dim, reverse } from './ansi-output.ts';
import type { BrowserSnapshot } from './browser.ts';
import { getStringWidth, sliceEndToWidth, sliceToWidth } from './char-width.ts';

export const HELP_LINE =
  'Video Browser - arrows/jk, PgUp/PgDn, g/G (top/bottom), / to filter, Enter to play, q to quit';

export interface RenderOptions {
  /** Paths are shown relative to this directory */
  videoDir: string;
  /** Terminal width; lines are cut to fit when set */
  width?: number;
}

/**
 * Cut `text` to `width` terminal cells, ending in an ellipsis when cut.
 */
export function truncate(text: string, width: number | undefined): string {
  if (width === undefined || width <= 0 || getStringWidth(text) <= width) {
    return text;
  }
  if (width === 1) {
    return sliceToWidth(text, 1);
  }
  return sliceToWidth(text, width - 1) + '…';
}

/**
 * 1-based range of the rows on screen, `0-0` for an empty list.
 */
export function visibleRange(snapshot: BrowserSnapshot): { first: number; last: number } {
  const count = snapshot.items.length;
  if (count === 0) {
    return { first: 0, last: 0 };
  }
  return {
    first: snapshot.viewportTop + 1,
    last: Math.min(snapshot.viewportTop + snapshot.viewportSize, count),
  };
}

export function renderStatusLine(snapshot: BrowserSnapshot): string {
  const { first, last } = visibleRange(snapshot);
  return `Found ${snapshot.items.length} videos (showing ${first}-${last})`;
}

/**
 * `/` followed by the edit buffer with the caret in reverse video.
 * Long input scrolls horizontally to keep the caret on screen.
 */
export function renderFilterLine(snapshot: BrowserSnapshot, width?: number): string {
  const { filterText: value, filterCursor: cursor, filterPlaceholder: placeholder } = snapshot;

  if (value === '') {
    if (placeholder === '') {
      return '/' + reverse(' ');
    }
    const first = String.fromCodePoint(placeholder.codePointAt(0) ?? 0x20);
    const rest = placeholder.slice(first.length);
    return '/' + reverse(first) + dim(truncate(rest, width ? width - 1 - getStringWidth(first) : undefined));
  }

  const codePoint = value.codePointAt(cursor);
  const atCursor = codePoint === undefined ? ' ' : String.fromCodePoint(codePoint);
  const caretWidth = Math.max(getStringWidth(atCursor), 1);

  // Cells after the '/' and the caret
  const room = width !== undefined && width > 2 ? width - 1 - caretWidth : Infinity;
  const before = sliceEndToWidth(value.slice(0, cursor), room);
  const rest = value.slice(cursor + (codePoint === undefined ? 0 : atCursor.length));
  const after = sliceToWidth(rest, room - getStringWidth(before));

  return '/' + before + reverse(atCursor) + after;
}

/**
 * Render the full screen as lines (no trailing newline).
 */
export function renderView(snapshot: BrowserSnapshot, options: RenderOptions): string[] {
  const { width } = options;
  const lines: string[] = [];

  lines.push(truncate(HELP_LINE, width));
  lines.push(truncate(renderStatusLine(snapshot), width));
  lines.push(snapshot.mode === 'filterEditing' ? renderFilterLine(snapshot, width) : '');

  const end = Math.min(snapshot.viewportTop + snapshot.viewportSize, snapshot.items.length);
  for (let i = snapshot.viewportTop; i < end; i++) {
    const label = truncate(relative(options.videoDir, snapshot.items[i]), width);
    lines.push(i === snapshot.cursor ? reverse(label) : label);
  }

  return lines;
}
