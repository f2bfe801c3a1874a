/**
 * Logger - Simple structured logging utility for camcap
 *
 * Silent by default so capture loops do not flood user output.
 * Enable via environment variable: CAMCAP_DEBUG=1
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  context: string;
  message: string;
  timestamp: number;
  data?: unknown;
}

export type LogSink = (entry: LogEntry) => void;

function isDebugEnabled(): boolean {
  if (typeof process !== 'undefined' && process.env) {
    return process.env.CAMCAP_DEBUG === '1' || process.env.CAMCAP_DEBUG === 'true';
  }
  return false;
}

let globalDebugMode = isDebugEnabled();
let globalSink: LogSink | null = null;

/**
 * Enable or disable debug logging globally
 */
export function setDebugMode(enabled: boolean): void {
  globalDebugMode = enabled;
}

/**
 * Check if debug mode is currently enabled
 */
export function isDebugMode(): boolean {
  return globalDebugMode;
}

/**
 * Route log entries to a custom sink instead of the console.
 * Pass null to restore console output.
 */
export function setLogSink(sink: LogSink | null): void {
  globalSink = sink;
}

/**
 * Logger class for structured logging
 */
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  debug(message: string, data?: unknown): void {
    if (!globalDebugMode) return;
    this._log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    if (!globalDebugMode) return;
    this._log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    if (!globalDebugMode) return;
    this._log('warn', message, data);
  }

  /**
   * Log an error message (only in debug mode).
   * Failures are still thrown to the caller; this is diagnostics only.
   */
  error(message: string, data?: unknown): void {
    if (!globalDebugMode) return;
    this._log('error', message, data);
  }

  private _log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      context: this.context,
      message,
      timestamp: Date.now(),
    };

    if (data !== undefined) {
      entry.data = data;
    }

    if (globalSink) {
      globalSink(entry);
      return;
    }

    const logMessage = `[camcap:${this.context}] ${message}`;

    switch (level) {
      case 'debug':
        console.debug(logMessage, data !== undefined ? data : '');
        break;
      case 'info':
        console.info(logMessage, data !== undefined ? data : '');
        break;
      case 'warn':
        console.warn(logMessage, data !== undefined ? data : '');
        break;
      case 'error':
        console.error(logMessage, data !== undefined ? data : '');
        break;
    }
  }
}

/**
 * Create a logger for a specific context
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}
