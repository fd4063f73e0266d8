// Single-line text field used as the filter edit buffer

import type { KeyEvent } from './input.ts';

export interface TextFieldOptions {
  value?: string;
  placeholder?: string;
  maxLength?: number;
}

export const DEFAULT_MAX_LENGTH = 100;

export class TextField {
  readonly placeholder: string;
  readonly maxLength: number;
  private _value: string;
  private _cursor: number;

  constructor(options: TextFieldOptions = {}) {
    this.placeholder = options.placeholder ?? '';
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
    this._value = limitLength(options.value ?? '', this.maxLength);
    this._cursor = this._value.length;
  }

  get value(): string {
    return this._value;
  }

  /** Caret position in UTF-16 units, 0..value.length, never inside a surrogate pair */
  get cursor(): number {
    return this._cursor;
  }

  setValue(value: string): void {
    this._value = limitLength(value, this.maxLength);
    this._cursor = this._value.length;
  }

  clear(): void {
    this._value = '';
    this._cursor = 0;
  }

  /**
   * Apply one key. Returns true if the key was an editing key.
   */
  handleKey(event: KeyEvent): boolean {
    const { key, ctrlKey, altKey } = event;
    let value = this._value;
    let cursor = this._cursor;

    const isBackspace = key === 'Backspace' || (ctrlKey && key === 'h');

    if (isBackspace) {
      const start = previousBoundary(value, cursor);
      value = value.slice(0, start) + value.slice(cursor);
      cursor = start;
    } else if (key === 'Delete' || (ctrlKey && key === 'd')) {
      value = value.slice(0, cursor) + value.slice(nextBoundary(value, cursor));
    } else if (key === 'ArrowLeft' || (ctrlKey && key === 'b')) {
      cursor = previousBoundary(value, cursor);
    } else if (key === 'ArrowRight' || (ctrlKey && key === 'f')) {
      cursor = nextBoundary(value, cursor);
    } else if (key === 'Home' || (ctrlKey && key === 'a')) {
      cursor = 0;
    } else if (key === 'End' || (ctrlKey && key === 'e')) {
      cursor = value.length;
    } else if (ctrlKey && key === 'u') {
      // Kill from beginning to cursor
      value = value.slice(cursor);
      cursor = 0;
    } else if (ctrlKey && key === 'k') {
      // Kill from cursor to end
      value = value.slice(0, cursor);
    } else if (ctrlKey && key === 'w') {
      // Kill previous word: skip spaces before the cursor, then the word
      let wordStart = cursor;
      while (wordStart > 0 && value[wordStart - 1] === ' ') {
        wordStart--;
      }
      while (wordStart > 0 && value[wordStart - 1] !== ' ') {
        wordStart--;
      }
      value = value.slice(0, wordStart) + value.slice(cursor);
      cursor = wordStart;
    } else if (isPrintable(key) && !ctrlKey && !altKey) {
      if (codePointLength(value) + 1 <= this.maxLength) {
        value = value.slice(0, cursor) + key + value.slice(cursor);
        cursor += key.length;
      }
    } else {
      return false;
    }

    this._value = value;
    this._cursor = cursor;
    return true;
  }
}

/**
 * Single printable character (including non-ASCII), not a named key.
 */
function isPrintable(key: string): boolean {
  if ([...key].length !== 1) {
    return false;
  }
  const code = key.codePointAt(0) ?? 0;
  return code >= 32 && code !== 127;
}

function codePointLength(text: string): number {
  return Array.from(text).length;
}

function limitLength(text: string, maxLength: number): string {
  return Array.from(text).slice(0, maxLength).join('');
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xDC00 && code <= 0xDFFF;
}

/**
 * Start of the code point before `index`.
 */
function previousBoundary(text: string, index: number): number {
  if (index <= 0) return 0;
  if (index >= 2 && isLowSurrogate(text.charCodeAt(index - 1)) && (text.codePointAt(index - 2) ?? 0) > 0xFFFF) {
    return index - 2;
  }
  return index - 1;
}

/**
 * End of the code point starting at `index`.
 */
function nextBoundary(text: string, index: number): number {
  if (index >= text.length) return text.length;
  return index + ((text.codePointAt(index) ?? 0) > 0xFFFF ? 2 : 1);
}
