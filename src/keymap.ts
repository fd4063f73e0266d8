// Key bindings: terminal keys to browser events

import type { BrowserEvent, BrowserMode } from './browser.ts';
import type { KeyEvent } from './input.ts';

const NAVIGATION_KEYS: Record<string, BrowserEvent> = {
  'ArrowUp': { type: 'moveUp' },
  'k': { type: 'moveUp' },
  'ArrowDown': { type: 'moveDown' },
  'j': { type: 'moveDown' },
  'PageUp': { type: 'pageUp' },
  'PageDown': { type: 'pageDown' },
  'Home': { type: 'jumpTop' },
  'g': { type: 'jumpTop' },
  'End': { type: 'jumpBottom' },
  'G': { type: 'jumpBottom' },
  '/': { type: 'enterFilterMode' },
  'Enter': { type: 'confirm' },
  'q': { type: 'quit' },
};

function isCtrlC(key: KeyEvent): boolean {
  return key.ctrlKey && key.key === 'c';
}

/**
 * Map a key to the browser event it triggers in `mode`, or null if unbound.
 * In filter editing every key that is not commit or cancel is an edit.
 */
export function keyToBrowserEvent(key: KeyEvent, mode: BrowserMode): BrowserEvent | null {
  if (mode === 'filterEditing') {
    if (key.key === 'Enter' && !key.altKey) {
      return { type: 'commit' };
    }
    if (key.key === 'Escape' || isCtrlC(key)) {
      return { type: 'cancel' };
    }
    return { type: 'edit', key };
  }

  if (isCtrlC(key)) {
    return { type: 'quit' };
  }
  if (key.ctrlKey || key.altKey) {
    return null;
  }
  return NAVIGATION_KEYS[key.key] ?? null;
}
