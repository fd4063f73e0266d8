// Tests for terminal cell widths

import { expect, test } from 'vitest';
import { getCharWidth, getStringWidth, sliceEndToWidth, sliceToWidth } from '../src/char-width.ts';

test('getCharWidth classifies characters', () => {
  expect(getCharWidth('a')).toBe(1);
  expect(getCharWidth('日')).toBe(2);
  expect(getCharWidth('🎬')).toBe(2);
  expect(getCharWidth('́')).toBe(0);
  expect(getCharWidth('\x07')).toBe(-1);
});

test('getStringWidth sums cells per code point', () => {
  expect(getStringWidth('a日🎬')).toBe(5);
  expect(getStringWidth('')).toBe(0);
});

test('sliceToWidth never splits a wide character', () => {
  expect(sliceToWidth('日本語', 3)).toBe('日');
  expect(sliceToWidth('a🎬', 2)).toBe('a');
  expect(sliceToWidth('a🎬', 3)).toBe('a🎬');
});

test('sliceEndToWidth keeps the widest fitting suffix', () => {
  expect(sliceEndToWidth('日本語', 5)).toBe('本語');
  expect(sliceEndToWidth('abc', 10)).toBe('abc');
  expect(sliceEndToWidth('abc', 0)).toBe('');
});
