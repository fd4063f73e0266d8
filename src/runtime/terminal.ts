/**
 * Runtime-agnostic terminal I/O and signal handling.
 * Wraps process.stdin, process.stdout, process.stderr and signal listeners.
 */

export type Signal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

/**
 * Readable side of a terminal. process.stdin satisfies this; tests use a PassThrough.
 */
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

/**
 * Writable side of a terminal. `rows`/`columns` are only present on a TTY.
 */
export interface TerminalOutput extends NodeJS.WritableStream {
  isTTY?: boolean;
  rows?: number;
  columns?: number;
}

export const stdin: TerminalInput = process.stdin;
export const stdout: TerminalOutput = process.stdout;
export const stderr: TerminalOutput = process.stderr;

export function consoleSize(output: TerminalOutput = stdout): { columns: number; rows: number } | null {
  if (!output.isTTY || output.rows === undefined || output.columns === undefined) {
    return null;
  }
  return { columns: output.columns, rows: output.rows };
}

export function setRaw(input: TerminalInput, mode: boolean): boolean {
  if (!input.isTTY || !input.setRawMode) {
    return false;
  }
  input.setRawMode(mode);
  return true;
}

export function addSignalListener(signal: Signal, handler: () => void): void {
  process.on(signal, handler);
}

export function removeSignalListener(signal: Signal, handler: () => void): void {
  process.off(signal, handler);
}
