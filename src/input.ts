// Input processing for raw terminal bytes
// Splits escape sequences and converts them to key events with DOM-style key names.

export interface KeyEvent {
  key: string;
  ctrlKey: boolean;
  altKey: boolean;
  shiftKey: boolean;
  /** Raw sequence the key was decoded from */
  sequence: string;
}

interface RawKeyInput {
  sequence: string;
  name: string;
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
}

// Common escape sequences
const ESCAPE_MAP: Record<string, { name: string; shift?: boolean }> = {
  '\x1b[A': { name: 'up' },
  '\x1b[B': { name: 'down' },
  '\x1b[C': { name: 'right' },
  '\x1b[D': { name: 'left' },
  '\x1b[H': { name: 'home' },
  '\x1b[F': { name: 'end' },
  '\x1bOA': { name: 'up' },
  '\x1bOB': { name: 'down' },
  '\x1bOC': { name: 'right' },
  '\x1bOD': { name: 'left' },
  '\x1bOH': { name: 'home' },
  '\x1bOF': { name: 'end' },
  '\x1b[Z': { name: 'tab', shift: true },
  '\x1b[2~': { name: 'insert' },
  '\x1b[3~': { name: 'delete' },
  '\x1b[5~': { name: 'pageup' },
  '\x1b[6~': { name: 'pagedown' },
  '\x1b[1~': { name: 'home' },
  '\x1b[4~': { name: 'end' },
  '\x1b[7~': { name: 'home' },
  '\x1b[8~': { name: 'end' },
  '\x1b\x08': { name: 'backspace' },
  '\x1b\x7f': { name: 'backspace' },
};

const KEY_NAMES: Record<string, string> = {
  'enter': 'Enter',
  'backspace': 'Backspace',
  'delete': 'Delete',
  'tab': 'Tab',
  'escape': 'Escape',
  'up': 'ArrowUp',
  'down': 'ArrowDown',
  'left': 'ArrowLeft',
  'right': 'ArrowRight',
  'home': 'Home',
  'end': 'End',
  'pageup': 'PageUp',
  'pagedown': 'PageDown',
  'insert': 'Insert',
};

/**
 * Stateful parser: keeps a UTF-8 decoder so multi-byte characters split
 * across reads come out whole, and holds back an escape sequence cut off
 * at the end of a read until the next read or `flush()`.
 */
export class KeyInputParser {
  private _decoder = new TextDecoder();
  private _pending = '';

  /**
   * Parse one chunk of terminal input into key events.
   * Mouse reports are dropped.
   */
  parse(data: Uint8Array | string): KeyEvent[] {
    const decoded = typeof data === 'string' ? data : this._decoder.decode(data, { stream: true });
    const sequences = splitSequences(this._pending + decoded);
    this._pending = '';

    const last = sequences[sequences.length - 1];
    if (last !== undefined && isIncompleteSequence(last)) {
      this._pending = last;
      sequences.pop();
    }

    return toKeyEvents(sequences);
  }

  /**
   * True while an escape sequence prefix is waiting for more input.
   */
  get hasPending(): boolean {
    return this._pending !== '';
  }

  /**
   * Decode the held-back prefix as it stands: a lone ESC becomes Escape.
   */
  flush(): KeyEvent[] {
    const pending = this._pending;
    this._pending = '';
    return pending === '' ? [] : toKeyEvents(splitSequences(pending));
  }
}

function toKeyEvents(sequences: string[]): KeyEvent[] {
  const events: KeyEvent[] = [];

  for (const sequence of sequences) {
    if (isMouseSequence(sequence)) {
      continue;
    }
    const raw = parseKeySequence(sequence);
    if (raw) {
      events.push(toKeyEvent(raw));
    }
  }

  return events;
}

/**
 * ESC, `ESC O`, a CSI without its final byte, or a short X10 mouse report.
 */
function isIncompleteSequence(sequence: string): boolean {
  if (sequence === '\x1b' || sequence === '\x1bO') {
    return true;
  }
  if (!sequence.startsWith('\x1b[')) {
    return false;
  }
  if (sequence.startsWith('\x1b[M')) {
    return sequence.length < 6;
  }
  return !isCSITerminator(sequence[sequence.length - 1]) || sequence.length === 2;
}

/**
 * Split raw text into individual key sequences.
 */
export function splitSequences(text: string): string[] {
  const sequences: string[] = [];
  let i = 0;

  while (i < text.length) {
    if (text[i] === '\x1b') {
      const sequence = parseEscapeSequence(text, i);
      sequences.push(sequence);
      i += sequence.length;
    } else {
      // Keep surrogate pairs together
      const char = String.fromCodePoint(text.codePointAt(i) ?? 0);
      sequences.push(char);
      i += char.length;
    }
  }

  return sequences;
}

function parseEscapeSequence(text: string, start: number): string {
  let end = start + 1;

  if (end < text.length && text[end] === '[') {
    // CSI sequence
    end++;

    // X10 mouse format: \x1b[M followed by 3 bytes
    if (end < text.length && text[end] === 'M') {
      end = Math.min(text.length, end + 4);
    } else {
      while (end < text.length && !isCSITerminator(text[end])) {
        end++;
      }
      if (end < text.length) {
        end++; // Include terminator
      }
    }
  } else if (end < text.length && text[end] === 'O') {
    // SS3 sequence: \x1bO plus one character
    end = Math.min(text.length, end + 2);
  } else if (end < text.length && text[end] !== '\x1b') {
    // Alt + character
    end++;
  }

  return text.slice(start, end);
}

function isCSITerminator(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 0x40 && code <= 0x7E;
}

function isMouseSequence(sequence: string): boolean {
  return sequence.startsWith('\x1b[<') || sequence.startsWith('\x1b[M');
}

function parseKeySequence(sequence: string): RawKeyInput | null {
  if (sequence === '\x1b') {
    return { sequence, name: 'escape' };
  }

  if (sequence.startsWith('\x1b')) {
    return parseEscapeKeySequence(sequence);
  }

  const code = sequence.codePointAt(0) ?? 0;

  if (code === 127) {
    // DEL character (backspace on most Unix terminals)
    return { sequence, name: 'backspace' };
  }

  if (code < 32) {
    // Enter, Tab, Backspace and Escape are standalone keys, the rest are Ctrl+letter
    const isStandaloneKey = code === 8 || code === 9 || code === 10 || code === 13 || code === 27;
    return {
      sequence,
      name: controlKeyName(code),
      ctrl: !isStandaloneKey,
    };
  }

  return { sequence, name: sequence };
}

function parseEscapeKeySequence(sequence: string): RawKeyInput | null {
  const mapping = ESCAPE_MAP[sequence];
  if (mapping) {
    return { sequence, name: mapping.name, shift: mapping.shift };
  }

  // Modified keys: \x1b[1;<mod>X and \x1b[<n>;<mod>~
  const modifiedMatch = sequence.match(/^\x1b\[(\d+);(\d+)([ABCDHF~])$/);
  if (modifiedMatch) {
    const modifierCode = parseInt(modifiedMatch[2], 10) - 1;
    const final = modifiedMatch[3];
    const name = final === '~'
      ? ESCAPE_MAP[`\x1b[${modifiedMatch[1]}~`]?.name
      : ESCAPE_MAP[`\x1b[${final}`]?.name;
    if (!name) {
      return null;
    }
    return {
      sequence,
      name,
      shift: (modifierCode & 1) !== 0,
      alt: (modifierCode & 2) !== 0,
      ctrl: (modifierCode & 4) !== 0,
    };
  }

  // Alt + character
  if (sequence.length === 2) {
    const inner = parseKeySequence(sequence[1]);
    return inner ? { ...inner, sequence, alt: true } : null;
  }

  // Unknown CSI sequences (focus reports, function keys) are ignored
  return null;
}

function controlKeyName(code: number): string {
  switch (code) {
    case 8:
      return 'backspace';
    case 9:
      return 'tab';
    case 10:
    case 13:
      return 'enter';
    case 27:
      return 'escape';
    case 0:
      return ' ';
    default:
      // 1..26 -> a..z, 28..31 -> \ ] ^ _
      return String.fromCharCode(code <= 26 ? code + 96 : code + 64);
  }
}

function toKeyEvent(raw: RawKeyInput): KeyEvent {
  return {
    key: KEY_NAMES[raw.name] ?? raw.name,
    ctrlKey: raw.ctrl ?? false,
    altKey: raw.alt ?? false,
    shiftKey: raw.shift ?? false,
    sequence: raw.sequence,
  };
}
