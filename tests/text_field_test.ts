// Tests for the filter edit buffer

import { expect, test } from 'vitest';
import { DEFAULT_MAX_LENGTH, TextField } from '../src/text-field.ts';
import { ctrl, key } from './helpers.ts';

function typeText(field: TextField, text: string): void {
  for (const char of text) {
    field.handleKey(key(char));
  }
}

test('typing inserts at the caret', () => {
  const field = new TextField();
  typeText(field, 'abc');
  field.handleKey(key('ArrowLeft'));
  typeText(field, 'X');

  expect(field.value).toBe('abXc');
  expect(field.cursor).toBe(3);
});

test('backspace and delete', () => {
  const field = new TextField({ value: 'abcd' });
  expect(field.cursor).toBe(4);

  field.handleKey(key('Backspace'));
  expect(field.value).toBe('abc');

  field.handleKey(key('Home'));
  field.handleKey(key('Delete'));
  expect(field.value).toBe('bc');
  expect(field.cursor).toBe(0);

  // Nothing to delete before the start
  field.handleKey(key('Backspace'));
  expect(field.value).toBe('bc');
  expect(field.cursor).toBe(0);
});

test('caret movement stays inside the text', () => {
  const field = new TextField({ value: 'ab' });
  field.handleKey(key('ArrowRight'));
  expect(field.cursor).toBe(2);
  field.handleKey(ctrl('a'));
  expect(field.cursor).toBe(0);
  field.handleKey(key('ArrowLeft'));
  expect(field.cursor).toBe(0);
  field.handleKey(ctrl('e'));
  expect(field.cursor).toBe(2);
});

test('Ctrl+U and Ctrl+K kill to the start and end', () => {
  const field = new TextField({ value: 'abcd' });
  field.handleKey(key('ArrowLeft'));
  field.handleKey(key('ArrowLeft'));
  field.handleKey(ctrl('u'));
  expect(field.value).toBe('cd');
  expect(field.cursor).toBe(0);

  field.setValue('abcd');
  field.handleKey(key('Home'));
  field.handleKey(key('ArrowRight'));
  field.handleKey(ctrl('k'));
  expect(field.value).toBe('a');
  expect(field.cursor).toBe(1);
});

test('Ctrl+W deletes the previous word and trailing spaces', () => {
  const field = new TextField({ value: 'foo bar ' });
  field.handleKey(ctrl('w'));
  expect(field.value).toBe('foo ');
  expect(field.cursor).toBe(4);
});

test('input is limited to maxLength', () => {
  const field = new TextField({ maxLength: 3 });
  typeText(field, 'abcd');
  expect(field.value).toBe('abc');
  expect(new TextField().maxLength).toBe(DEFAULT_MAX_LENGTH);
});

test('non-ASCII characters are inserted whole', () => {
  const field = new TextField();
  typeText(field, 'é😀');
  expect(field.value).toBe('é😀');
});

test('backspace removes a whole emoji', () => {
  const field = new TextField();
  typeText(field, 'a🎬');
  field.handleKey(key('Backspace'));
  expect(field.value).toBe('a');
  expect(field.cursor).toBe(1);
});

test('caret moves over an emoji in one step', () => {
  const field = new TextField({ value: 'a🎬b' });
  expect(field.cursor).toBe(4);

  field.handleKey(key('ArrowLeft'));
  expect(field.cursor).toBe(3);
  field.handleKey(key('ArrowLeft'));
  expect(field.cursor).toBe(1);

  field.handleKey(key('Delete'));
  expect(field.value).toBe('ab');
  expect(field.cursor).toBe(1);

  field.handleKey(key('ArrowRight'));
  expect(field.cursor).toBe(2);
});

test('maxLength counts characters, not UTF-16 units', () => {
  const field = new TextField({ maxLength: 2 });
  typeText(field, '🎬🎬🎬');
  expect(field.value).toBe('🎬🎬');

  field.setValue('日本語');
  expect(field.value).toBe('日本');
});

test('unbound keys are reported as not handled', () => {
  const field = new TextField({ value: 'a' });
  expect(field.handleKey(ctrl('x'))).toBe(false);
  expect(field.handleKey(key('Tab'))).toBe(false);
  expect(field.handleKey(key('z', { altKey: true }))).toBe(false);
  expect(field.value).toBe('a');
});

test('clear empties the buffer', () => {
  const field = new TextField({ value: 'abc', placeholder: 'filter...' });
  field.clear();
  expect(field.value).toBe('');
  expect(field.cursor).toBe(0);
  expect(field.placeholder).toBe('filter...');
});
