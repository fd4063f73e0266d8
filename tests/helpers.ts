// Shared test helpers

import type { KeyEvent } from '../src/input.ts';

export function key(name: string, modifiers: Partial<Omit<KeyEvent, 'key'>> = {}): KeyEvent {
  return {
    key: name,
    ctrlKey: false,
    altKey: false,
    shiftKey: false,
    sequence: name,
    ...modifiers,
  };
}

export function ctrl(name: string): KeyEvent {
  return key(name, { ctrlKey: true });
}

/**
 * Candidate list `/v/video-00.mp4` .. `/v/video-<count-1>.mp4`
 */
export function videoList(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `/v/video-${String(i).padStart(2, '0')}.mp4`);
}
