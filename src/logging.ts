// File-based logging for vidpick
// The terminal belongs to the browser while it runs, so log output goes to a file.

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { ConfigError } from './errors.ts';
import { ensureError } from './utils/error.ts';

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
  sessionId?: string;
}

export interface LoggerOptions {
  // Path to log file; empty string disables file logging
  logFile?: string;

  level?: LogLevel;

  format?: 'json' | 'text' | 'structured';

  bufferSize?: number;
  flushInterval?: number; // in milliseconds, 0 disables the timer
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  currentFileSize: number;
  bufferSize: number;
  lastFlush: Date;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class Logger {
  private _options: Required<LoggerOptions>;
  private _buffer: LogEntry[] = [];
  private _stats: LoggerStats;
  private _flushTimer?: NodeJS.Timeout;
  private _currentLogFile?: string;
  private _disabled = false;
  private _writeError?: Error;
  private _sessionId: string;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? '',
      level: options.level || 'INFO',
      format: options.format || 'structured',
      bufferSize: options.bufferSize || 100,
      flushInterval: options.flushInterval ?? 1000,
    };

    this._sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    this._stats = {
      totalEntries: 0,
      entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
      currentFileSize: 0,
      bufferSize: 0,
      lastFlush: new Date(),
    };
  }

  /**
   * Create the log directory and start the flush timer.
   * Throws ConfigError when the directory cannot be created.
   */
  initialize(): void {
    if (this._currentLogFile || this._disabled) {
      return;
    }

    if (this._options.logFile.trim() === '') {
      this._disabled = true;
      return;
    }

    const logFile = this._options.logFile;
    try {
      mkdirSync(dirname(logFile), { recursive: true });
    } catch (error) {
      throw new ConfigError(
        `Cannot create log directory for ${logFile}: ${ensureError(error).message} ` +
        '(set VIDPICK_LOG_FILE= to disable logging)'
      );
    }
    this._currentLogFile = logFile;

    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => this._flushQuietly(), this._options.flushInterval);
      // Never keep the process alive for the logger alone
      this._flushTimer.unref();
    }

    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: {
        sessionId: this._sessionId,
        logFile: this._currentLogFile,
      },
      source: 'Logger',
    });
  }

  get isEnabled(): boolean {
    return !this._disabled && this._currentLogFile !== undefined;
  }

  get logFile(): string | undefined {
    return this._currentLogFile;
  }

  /**
   * The error that disabled file logging mid-session, if any.
   */
  get writeError(): Error | undefined {
    return this._writeError;
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this._options.level];
  }

  formatEntry(entry: LogEntry): string {
    switch (this._options.format) {
      case 'json':
        return JSON.stringify({
          ...entry,
          timestamp: entry.timestamp.toISOString(),
          error: entry.error ? {
            message: entry.error.message,
            stack: entry.error.stack,
            name: entry.error.name,
          } : undefined,
        }) + '\n';

      case 'text': {
        let text = `[${entry.timestamp.toISOString()}] ${entry.level.padEnd(5)} `;
        if (entry.source) {
          text += `[${entry.source}] `;
        }
        text += entry.message;
        if (entry.context && Object.keys(entry.context).length > 0) {
          text += ` | ${JSON.stringify(entry.context)}`;
        }
        if (entry.error) {
          text += ` | ERROR: ${entry.error.message}`;
        }
        return text + '\n';
      }

      case 'structured':
      default: {
        let structured = `${entry.timestamp.toISOString()} [${entry.level}] `;
        if (entry.source) {
          structured += `${entry.source}: `;
        }
        structured += entry.message;

        if (entry.context && Object.keys(entry.context).length > 0) {
          structured += ' | ' + Object.entries(entry.context)
            .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
            .join(', ');
        }
        if (entry.error) {
          structured += `\n  Error: ${entry.error.message}`;
          if (entry.error.stack) {
            structured += `\n  Stack: ${entry.error.stack}`;
          }
        }
        return structured + '\n';
      }
    }
  }

  private _writeEntry(entry: LogEntry): void {
    if (this._disabled) {
      return;
    }

    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;

    if (!this._currentLogFile) {
      return;
    }

    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    if (this._buffer.length >= this._options.bufferSize) {
      this._flushQuietly();
    }
  }

  private _flushSync(): void {
    if (this._buffer.length === 0 || !this._currentLogFile) return;

    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      appendFileSync(this._currentLogFile, content);
    } catch (error) {
      // Re-add entries to buffer on write failure
      this._buffer.unshift(...entries);
      throw new Error(`Failed to write to log file "${this._currentLogFile}": ${ensureError(error).message}`);
    }

    this._stats.currentFileSize += Buffer.byteLength(content);
    this._stats.lastFlush = new Date();
    this._stats.bufferSize = this._buffer.length;
  }

  /**
   * Flush from a timer or a log call. A failed write turns file logging off
   * for the rest of the session and is kept in `writeError`.
   */
  private _flushQuietly(): void {
    try {
      this._flushSync();
    } catch (error) {
      this._writeError = ensureError(error);
      this._buffer = [];
      this._disabled = true;
      this._stopTimer();
    }
  }

  private _stopTimer(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    if (!this._shouldLog(level)) return;
    this._writeEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      error,
      source,
      sessionId: this._sessionId,
    });
  }

  trace(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('TRACE', message, context, source);
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  warn(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('FATAL', message, context, source, error);
  }

  /**
   * Write buffered entries now. Throws if the log file cannot be written.
   */
  flush(): void {
    if (this._disabled) return;
    this._flushSync();
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  close(): void {
    this._stopTimer();

    if (this._disabled || !this._currentLogFile) {
      return;
    }

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: {
        sessionId: this._sessionId,
        totalEntries: this._stats.totalEntries,
      },
      source: 'Logger',
      sessionId: this._sessionId,
    });

    this._flushQuietly();
    this._disabled = true;
  }
}

// Until the entry point installs a configured logger, nothing is written.
let globalLogger: Logger = new Logger({ logFile: '' });

export function createLogger(options?: LoggerOptions): Logger {
  const logger = new Logger(options);
  logger.initialize();
  return logger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

/**
 * Install a disabled logger (used after close and between tests).
 */
export function resetGlobalLogger(): void {
  globalLogger = new Logger({ logFile: '' });
}

// Component-specific logger interface that automatically includes source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

/**
 * Named logger bound to whichever global logger is installed at call time.
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => globalLogger.trace(message, context, name),
    debug: (message, context) => globalLogger.debug(message, context, name),
    info: (message, context) => globalLogger.info(message, context, name),
    warn: (message, context) => globalLogger.warn(message, context, name),
    error: (message, error, context) => globalLogger.error(message, error, context, name),
    fatal: (message, error, context) => globalLogger.fatal(message, error, context, name),
  };
}
