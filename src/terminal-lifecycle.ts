// Terminal lifecycle management - setup, cleanup, and signal handling

import { ANSI } from './ansi-output.ts';
import {
  addSignalListener,
  removeSignalListener,
  setRaw,
  type Signal,
  type TerminalInput,
  type TerminalOutput,
} from './runtime/mod.ts';

export interface TerminalLifecycleOptions {
  alternateScreen: boolean;
  hideCursor: boolean;
}

/**
 * Enter raw mode and set up the screen (alternate screen, hidden cursor).
 * Returns whether raw mode was enabled.
 */
export function setupTerminal(
  input: TerminalInput,
  output: TerminalOutput,
  options: TerminalLifecycleOptions
): boolean {
  const rawEnabled = setRaw(input, true);

  const codes: string[] = [];
  if (options.alternateScreen) {
    codes.push(ANSI.alternateScreen);
  }
  if (options.hideCursor) {
    codes.push(ANSI.hideCursor);
  }
  if (codes.length > 0) {
    output.write(codes.join(''));
  }

  return rawEnabled;
}

/**
 * Restore the terminal (normal screen, visible cursor, cooked input).
 */
export function cleanupTerminal(
  input: TerminalInput,
  output: TerminalOutput,
  options: TerminalLifecycleOptions
): void {
  const codes: string[] = [ANSI.reset];
  if (options.alternateScreen) {
    codes.push(ANSI.normalScreen);
  }
  if (options.hideCursor) {
    codes.push(ANSI.showCursor);
  }
  output.write(codes.join(''));

  setRaw(input, false);
}

/**
 * Emergency cleanup - minimal terminal restore when a fatal error escapes the session
 */
export function emergencyCleanupTerminal(output: TerminalOutput): void {
  output.write(`${ANSI.reset}${ANSI.normalScreen}${ANSI.showCursor}`);
}

const TERMINATION_SIGNALS: readonly Signal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Call `onSignal` for the termination signals until the returned function is called.
 */
export function setupCleanupHandlers(onSignal: (signal: Signal) => void): () => void {
  const handlers = TERMINATION_SIGNALS.map(signal => {
    const handler = () => onSignal(signal);
    addSignalListener(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      removeSignalListener(signal, handler);
    }
  };
}
