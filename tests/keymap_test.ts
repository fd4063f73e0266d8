// Tests for key bindings

import { expect, test } from 'vitest';
import { keyToBrowserEvent } from '../src/keymap.ts';
import { ctrl, key } from './helpers.ts';

test('navigation keys', () => {
  const cases: Array<[string, string]> = [
    ['ArrowUp', 'moveUp'],
    ['k', 'moveUp'],
    ['ArrowDown', 'moveDown'],
    ['j', 'moveDown'],
    ['PageUp', 'pageUp'],
    ['PageDown', 'pageDown'],
    ['Home', 'jumpTop'],
    ['g', 'jumpTop'],
    ['End', 'jumpBottom'],
    ['G', 'jumpBottom'],
    ['/', 'enterFilterMode'],
    ['Enter', 'confirm'],
    ['q', 'quit'],
  ];
  for (const [name, type] of cases) {
    expect(keyToBrowserEvent(key(name), 'navigation'), name).toEqual({ type });
  }
});

test('Ctrl+C quits in navigation', () => {
  expect(keyToBrowserEvent(ctrl('c'), 'navigation')).toEqual({ type: 'quit' });
});

test('unbound and modified keys do nothing in navigation', () => {
  expect(keyToBrowserEvent(key('x'), 'navigation')).toBeNull();
  expect(keyToBrowserEvent(ctrl('k'), 'navigation')).toBeNull();
  expect(keyToBrowserEvent(key('q', { altKey: true }), 'navigation')).toBeNull();
});

test('filter editing commits on Enter and cancels on Escape or Ctrl+C', () => {
  expect(keyToBrowserEvent(key('Enter'), 'filterEditing')).toEqual({ type: 'commit' });
  expect(keyToBrowserEvent(key('Escape'), 'filterEditing')).toEqual({ type: 'cancel' });
  expect(keyToBrowserEvent(ctrl('c'), 'filterEditing')).toEqual({ type: 'cancel' });
});

test('other keys are edits while filtering, including navigation letters', () => {
  const q = key('q');
  expect(keyToBrowserEvent(q, 'filterEditing')).toEqual({ type: 'edit', key: q });
  const up = key('ArrowUp');
  expect(keyToBrowserEvent(up, 'filterEditing')).toEqual({ type: 'edit', key: up });
});
