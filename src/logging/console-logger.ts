/**
 * Console Logger implementation
 * Pretty or JSON-line output of structured run events
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

const BASIC_EVENT_TYPES: readonly LogEventType[] = ['debug', 'info', 'warn', 'error'];

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private events: LogEvent[] = [];
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.options = {
      includeTimestamp: true,
      jsonOutput: false,
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger({ ...this.options, minLevel: this.minLevel });
    childLogger.setContext({ ...this.context, ...additionalContext });
    return childLogger;
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    this.events.push(event);
    this.output(event);
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }

  private output(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);

    // Everything goes to stderr in JSON mode so stdout stays machine-readable
    if (event.level === 'error' || this.options.jsonOutput) {
      console.error(line);
    } else if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(this.getLevelIndicator(event.level));

    if (!BASIC_EVENT_TYPES.includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { runId, phase, iteration } = event.metadata;
    const metaParts: string[] = [];
    if (runId) metaParts.push(`run=${runId}`);
    if (phase) metaParts.push(`phase=${phase}`);
    if (iteration !== undefined) metaParts.push(`iter=${iteration}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }

  private getLevelIndicator(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return '🔍';
      case 'info':
        return 'ℹ️';
      case 'warn':
        return '⚠️';
      case 'error':
        return '❌';
    }
  }
}

/**
 * Create a console logger with optional options
 */
export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
