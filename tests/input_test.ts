// Tests for terminal input parsing

import { expect, test } from 'vitest';
import { KeyInputParser, splitSequences } from '../src/input.ts';

function keys(data: string): string[] {
  return new KeyInputParser().parse(data).map(event => event.key);
}

test('splitSequences separates characters and escape sequences', () => {
  expect(splitSequences('j\x1b[Ak')).toEqual(['j', '\x1b[A', 'k']);
  expect(splitSequences('\x1bOH\x1b[5~')).toEqual(['\x1bOH', '\x1b[5~']);
  expect(splitSequences('\x1b\x1b')).toEqual(['\x1b', '\x1b']);
});

test('printable characters keep their value', () => {
  expect(keys('jk/G')).toEqual(['j', 'k', '/', 'G']);
});

test('arrow and navigation keys get DOM names', () => {
  expect(keys('\x1b[A\x1b[B\x1b[C\x1b[D')).toEqual(['ArrowUp', 'ArrowDown', 'ArrowRight', 'ArrowLeft']);
  expect(keys('\x1b[5~\x1b[6~')).toEqual(['PageUp', 'PageDown']);
  expect(keys('\x1b[H\x1b[F\x1bOH\x1bOF\x1b[1~\x1b[4~')).toEqual(['Home', 'End', 'Home', 'End', 'Home', 'End']);
  expect(keys('\x1b[3~')).toEqual(['Delete']);
});

test('control characters', () => {
  const [enter, ctrlC, backspace, tab] = new KeyInputParser().parse('\r\x03\x7f\t');
  expect(enter).toMatchObject({ key: 'Enter', ctrlKey: false });
  expect(ctrlC).toMatchObject({ key: 'c', ctrlKey: true });
  expect(backspace).toMatchObject({ key: 'Backspace', ctrlKey: false });
  expect(tab).toMatchObject({ key: 'Tab', ctrlKey: false });
});

test('control codes above 26 map to punctuation', () => {
  const [event] = new KeyInputParser().parse('\x1c');
  expect(event).toMatchObject({ key: '\\', ctrlKey: true });
});

test('lone escape is held back until flushed', () => {
  const parser = new KeyInputParser();
  expect(parser.parse('\x1b')).toEqual([]);
  expect(parser.hasPending).toBe(true);
  expect(parser.flush().map(event => event.key)).toEqual(['Escape']);
  expect(parser.hasPending).toBe(false);
  expect(parser.flush()).toEqual([]);
});

test('escape sequence split across reads is joined', () => {
  const parser = new KeyInputParser();
  expect(parser.parse('a\x1b')).toMatchObject([{ key: 'a' }]);
  expect(parser.parse('[A')).toMatchObject([{ key: 'ArrowUp', altKey: false }]);

  expect(parser.parse('\x1b[6')).toEqual([]);
  expect(parser.parse('~')).toMatchObject([{ key: 'PageDown' }]);

  expect(parser.parse('\x1bO')).toEqual([]);
  expect(parser.parse('H')).toMatchObject([{ key: 'Home' }]);
  expect(parser.hasPending).toBe(false);
});

test('two escapes in one read: the first is a key, the second waits', () => {
  const parser = new KeyInputParser();
  expect(parser.parse('\x1b\x1b').map(event => event.key)).toEqual(['Escape']);
  expect(parser.flush().map(event => event.key)).toEqual(['Escape']);
});

test('alt prefix sets altKey', () => {
  const [event] = new KeyInputParser().parse('\x1bx');
  expect(event).toMatchObject({ key: 'x', altKey: true, ctrlKey: false, sequence: '\x1bx' });
});

test('modifier parameters decode shift, alt and ctrl', () => {
  const [ctrlUp] = new KeyInputParser().parse('\x1b[1;5A');
  expect(ctrlUp).toMatchObject({ key: 'ArrowUp', ctrlKey: true, altKey: false, shiftKey: false });

  const [shiftPageDown] = new KeyInputParser().parse('\x1b[6;2~');
  expect(shiftPageDown).toMatchObject({ key: 'PageDown', shiftKey: true, ctrlKey: false });
});

test('mouse reports and unknown sequences are dropped', () => {
  expect(keys('\x1b[<0;10;5M')).toEqual([]);
  expect(keys('\x1b[200~')).toEqual([]);
  expect(keys('\x1b[<0;10;5mq')).toEqual(['q']);
});

test('UTF-8 split across reads is decoded whole', () => {
  const parser = new KeyInputParser();
  expect(parser.parse(new Uint8Array([0xc3]))).toEqual([]);
  const [event] = parser.parse(new Uint8Array([0xa9]));
  expect(event.key).toBe('é');
});
