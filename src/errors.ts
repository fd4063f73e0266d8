// Error types for the vidpick pipeline
// Every stage is all-or-nothing: each error class is fatal for the process.

import { errorCode } from './utils/error.ts';

export class VidpickError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VidpickError';
  }
}

/**
 * Missing or malformed argument, flag or environment variable.
 */
export class ConfigError extends VidpickError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reading the video directory tree failed. The scan is abandoned.
 */
export class ScanError extends VidpickError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ScanError';
  }

  static fromFsError(path: string, cause: unknown): ScanError {
    return new ScanError(formatFsError(path, cause), path, cause);
  }
}

/**
 * Terminal or display failure during the interactive session.
 */
export class UIError extends VidpickError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UIError';
  }
}

/**
 * The player could not be started, or exited unsuccessfully.
 */
export class PlaybackError extends VidpickError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly childExitCode: number | null = null,
    public readonly signal: string | null = null,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'PlaybackError';
  }
}

export function isVidpickError(error: unknown): error is VidpickError {
  return error instanceof VidpickError;
}

/**
 * Format a filesystem error for display, keyed on the Node error code.
 */
export function formatFsError(path: string, error: unknown): string {
  switch (errorCode(error)) {
    case 'EACCES':
    case 'EPERM':
      return `Permission denied: ${path}`;
    case 'ENOENT':
      return `No such file or directory: ${path}`;
    case 'ENOTDIR':
      return `Not a directory: ${path}`;
    default: {
      const message = error instanceof Error ? error.message : String(error);
      return `Cannot read ${path}: ${message}`;
    }
  }
}
