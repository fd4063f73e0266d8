// Interactive session: terminal input -> browser events -> redraw

import { ANSI } from './ansi-output.ts';
import type { VideoBrowser } from './browser.ts';
import { UIError } from './errors.ts';
import { KeyInputParser, type KeyEvent } from './input.ts';
import { keyToBrowserEvent } from './keymap.ts';
import { getLogger } from './logging.ts';
import { renderView } from './rendering.ts';
import {
  consoleSize,
  stdin,
  stdout,
  type TerminalInput,
  type TerminalOutput,
} from './runtime/mod.ts';
import {
  cleanupTerminal,
  setupCleanupHandlers,
  setupTerminal,
  type TerminalLifecycleOptions,
} from './terminal-lifecycle.ts';
import { ensureError } from './utils/error.ts';

const logger = getLogger('Session');

export interface SessionOptions {
  /** Paths are displayed relative to this directory */
  videoDir: string;
  input?: TerminalInput;
  output?: TerminalOutput;
  alternateScreen?: boolean;
  /** Wrap each frame in synchronized-output sequences */
  syncRendering?: boolean;
  /** Quit on SIGINT/SIGTERM/SIGHUP while the session runs */
  handleSignals?: boolean;
  /** Fail unless input is a TTY that supports raw mode */
  requireTerminal?: boolean;
  /** Milliseconds to wait for the rest of an escape sequence before reading ESC as Escape */
  escapeTimeout?: number;
}

export const DEFAULT_ESCAPE_TIMEOUT = 50;

/**
 * Run the browser until the user selects a video or quits.
 * Resolves with the selected path, or null when the user quit.
 * The terminal is restored before the promise settles.
 */
export function runBrowserSession(browser: VideoBrowser, options: SessionOptions): Promise<string | null> {
  const input = options.input ?? stdin;
  const output = options.output ?? stdout;
  const lifecycle: TerminalLifecycleOptions = {
    alternateScreen: options.alternateScreen ?? true,
    hideCursor: true,
  };
  const syncRendering = options.syncRendering ?? true;
  const escapeTimeout = options.escapeTimeout ?? DEFAULT_ESCAPE_TIMEOUT;
  const parser = new KeyInputParser();

  return new Promise((resolve, reject) => {
    if ((options.requireTerminal ?? true) && !input.isTTY) {
      reject(new UIError('standard input is not a terminal'));
      return;
    }

    let settled = false;
    let removeSignalHandlers = () => {};
    let escapeTimer: NodeJS.Timeout | undefined;

    const clearEscapeTimer = () => {
      if (escapeTimer !== undefined) {
        clearTimeout(escapeTimer);
        escapeTimer = undefined;
      }
    };

    const render = () => {
      const lines = renderView(browser.snapshot(), {
        videoDir: options.videoDir,
        width: consoleSize(output)?.columns,
      });
      let frame = ANSI.cursorHome + ANSI.clearScreen + lines.join('\r\n');
      if (syncRendering) {
        frame = ANSI.beginSync + frame + ANSI.endSync;
      }
      output.write(frame);
    };

    const detach = () => {
      clearEscapeTimer();
      input.off('data', onData);
      input.off('end', onEnd);
      input.off('error', onError);
      output.off('resize', onResize);
      removeSignalHandlers();
      input.pause();
    };

    const finish = () => {
      if (settled) return;
      settled = true;
      detach();
      try {
        cleanupTerminal(input, output, lifecycle);
      } catch (error) {
        reject(new UIError(`Failed to restore terminal: ${ensureError(error).message}`, error));
        return;
      }
      logger.info('Session ended', { status: browser.status });
      resolve(browser.selection);
    };

    const fail = (error: unknown) => {
      if (settled) return;
      settled = true;
      detach();
      const cause = ensureError(error);
      logger.error('Session failed', cause);
      try {
        cleanupTerminal(input, output, lifecycle);
      } catch (cleanupError) {
        logger.error('Terminal cleanup failed', ensureError(cleanupError));
      }
      reject(cause instanceof UIError ? cause : new UIError(cause.message, cause));
    };

    // Returns false once the session has finished
    const handleKeys = (keys: KeyEvent[]): boolean => {
      for (const key of keys) {
        const event = keyToBrowserEvent(key, browser.mode);
        if (!event) continue;
        logger.trace('Dispatch', { event: event.type, key: key.key });
        browser.dispatch(event);
        if (browser.isFinished) {
          finish();
          return false;
        }
      }
      render();
      return true;
    };

    const onEscapeTimeout = () => {
      escapeTimer = undefined;
      try {
        handleKeys(parser.flush());
      } catch (error) {
        fail(error);
      }
    };

    const onData = (chunk: Uint8Array | string) => {
      clearEscapeTimer();
      try {
        if (handleKeys(parser.parse(chunk)) && parser.hasPending) {
          escapeTimer = setTimeout(onEscapeTimeout, escapeTimeout);
        }
      } catch (error) {
        fail(error);
      }
    };

    const onEnd = () => {
      // End of input: nothing more can be chosen
      browser.dispatch({ type: 'quit' });
      finish();
    };

    const onError = (error: Error) => fail(error);

    const onResize = () => {
      try {
        const size = consoleSize(output);
        if (size) {
          browser.dispatch({ type: 'resize', height: size.rows });
        }
        render();
      } catch (error) {
        fail(error);
      }
    };

    try {
      const rawEnabled = setupTerminal(input, output, lifecycle);
      logger.info('Session started', {
        candidates: browser.candidates.length,
        rawMode: rawEnabled,
        alternateScreen: lifecycle.alternateScreen,
      });

      const size = consoleSize(output);
      if (size) {
        browser.dispatch({ type: 'resize', height: size.rows });
      }

      if (options.handleSignals ?? true) {
        removeSignalHandlers = setupCleanupHandlers(signal => {
          logger.info('Signal received', { signal });
          browser.dispatch({ type: 'quit' });
          finish();
        });
      }

      input.on('data', onData);
      input.on('end', onEnd);
      input.on('error', onError);
      output.on('resize', onResize);
      input.resume();

      render();
    } catch (error) {
      fail(error);
    }
  });
}
