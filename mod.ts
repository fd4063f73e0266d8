// vidpick library entry point
// Import this for library usage: import { ... } from './mod.ts'

export { main, loadDotenvFiles, describeError, generateHelp, VERSION, type MainDeps } from './src/vidpick-main.ts';

// Scanning and filtering
export * from './src/scanner.ts';
export * from './src/filter.ts';

// Browser state machine and its input
export * from './src/browser.ts';
export * from './src/keymap.ts';
export { KeyInputParser, splitSequences, type KeyEvent } from './src/input.ts';
export { TextField, DEFAULT_MAX_LENGTH, type TextFieldOptions } from './src/text-field.ts';

// Rendering and the interactive session
export * from './src/rendering.ts';
export { runBrowserSession, type SessionOptions } from './src/session.ts';

// Playback
export { launchPlayer, type LaunchOptions } from './src/player.ts';

// Configuration, errors and logging
export * from './src/config/mod.ts';
export * from './src/errors.ts';
export { createLogger, getLogger, setGlobalLogger, resetGlobalLogger, Logger, type LogLevel, type LoggerOptions } from './src/logging.ts';
