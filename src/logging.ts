// File-based logging system for stylebox
// Provides structured logging with multiple output formats

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Env } from './env.ts';

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
  // Path to log file; empty disables file output
  logFile?: string;

  level?: LogLevel;

  format?: 'json' | 'text' | 'structured';
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;

  bufferSize?: number;
  flushInterval?: number; // in milliseconds

  consoleOutput?: boolean;
  consoleLevel?: LogLevel;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  currentFileSize: number;
  bufferSize: number;
  lastFlush: Date;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
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
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _initialized = false;
  private _fileDisabled: boolean;
  private _sessionId: string;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? '',
      level: options.level || 'INFO',
      format: options.format || 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize || 100,
      flushInterval: options.flushInterval || 1000,
      consoleOutput: options.consoleOutput ?? false,
      consoleLevel: options.consoleLevel || 'WARN',
    };

    this._fileDisabled = this._options.logFile.trim() === '';
    this._sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    this._stats = {
      totalEntries: 0,
      entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
      currentFileSize: 0,
      bufferSize: 0,
      lastFlush: new Date(),
    };
  }

  get sessionId(): string {
    return this._sessionId;
  }

  initialize(): void {
    if (this._initialized) return;
    this._initialized = true;
    if (this._fileDisabled) return;

    mkdirSync(dirname(this._options.logFile), { recursive: true });

    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => this.flush(), this._options.flushInterval);
      // Never hold the process open just to flush logs
      this._flushTimer.unref();
    }

    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: { sessionId: this._sessionId, logFile: this._options.logFile },
      source: 'Logger',
    });
  }

  isTraceEnabled(): boolean {
    return this._shouldLog('TRACE');
  }

  isDebugEnabled(): boolean {
    return this._shouldLog('DEBUG');
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this._options.level];
  }

  private _shouldConsole(level: LogLevel): boolean {
    return this._options.consoleOutput &&
           LOG_LEVELS[level] >= LOG_LEVELS[this._options.consoleLevel];
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
        let text = '';
        if (this._options.includeTimestamp) {
          text += `[${entry.timestamp.toISOString()}] `;
        }
        if (this._options.includeLevel) {
          text += `${entry.level.padEnd(5)} `;
        }
        if (this._options.includeSource && entry.source) {
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
        let structured = '';
        if (this._options.includeTimestamp) {
          structured += `${entry.timestamp.toISOString()} `;
        }
        if (this._options.includeLevel) {
          structured += `[${entry.level}] `;
        }
        if (this._options.includeSource && entry.source) {
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
    if (!this._initialized) {
      this.initialize();
    }

    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;

    if (this._shouldConsole(entry.level)) {
      const formatted = this.formatEntry(entry).trim();
      if (entry.level === 'ERROR' || entry.level === 'FATAL') {
        console.error(formatted);
      } else if (entry.level === 'WARN') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this._fileDisabled) return;

    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    if (this._buffer.length >= this._options.bufferSize) {
      this.flush();
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

  // Public logging methods

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

  // Utility methods

  flush(): void {
    if (this._buffer.length === 0 || this._fileDisabled) return;

    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      appendFileSync(this._options.logFile, content);
    } catch (error) {
      // Re-add entries so a later flush can retry
      this._buffer.unshift(...entries);
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to write to log file "${this._options.logFile}": ${errorMessage}`);
    }

    this._stats.currentFileSize += Buffer.byteLength(content);
    this._stats.lastFlush = new Date();
    this._stats.bufferSize = this._buffer.length;
  }

  setLevel(level: LogLevel): void {
    this._options.level = level;
  }

  getLevel(): LogLevel {
    return this._options.level;
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  close(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
    if (this._fileDisabled) return;

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: { sessionId: this._sessionId, totalEntries: this._stats.totalEntries },
      source: 'Logger',
      sessionId: this._sessionId,
    });
    this.flush();
  }
}

// Environment variable configuration helpers
function getLogLevelFromEnv(): LogLevel | undefined {
  const envLevel = Env.get('STYLEBOX_LOG_LEVEL')?.toUpperCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : undefined;
}

function createDefaultLoggerOptions(): LoggerOptions {
  return {
    level: getLogLevelFromEnv() || 'INFO',
    // File logging stays off unless a file is named
    logFile: Env.get('STYLEBOX_LOG_FILE') ?? '',
    format: 'structured',
    includeTimestamp: true,
    includeLevel: true,
    includeSource: true,
    bufferSize: 100,
    flushInterval: 1000,
    consoleOutput: false,
    consoleLevel: 'ERROR',
  };
}

let globalLogger: Logger | undefined;

export function createLogger(options?: LoggerOptions): Logger {
  const logger = new Logger({ ...createDefaultLoggerOptions(), ...options });
  logger.initialize();
  return logger;
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

// Component-specific logger interface that automatically includes source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

/**
 * Logger bound to a source name. Resolves the global logger on every call so
 * that setGlobalLogger() takes effect for modules that captured it at load.
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
    isTraceEnabled: () => getGlobalLogger().isTraceEnabled(),
    isDebugEnabled: () => getGlobalLogger().isDebugEnabled(),
  };
}
