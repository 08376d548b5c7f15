/**
 * Logger interface
 * Structured logging with event types and metadata
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the run lifecycle
 */
export type LogEventType =
  // Run lifecycle
  | 'run_started'
  | 'run_completed'
  | 'run_failed'
  // Phase transitions
  | 'phase_started'
  | 'phase_completed'
  | 'repair_loop'
  // Worker events
  | 'worker_invocation_started'
  | 'worker_invocation_completed'
  | 'worker_invocation_failed'
  // Artifact events
  | 'artifact_written'
  | 'control_validated'
  | 'control_validation_failed'
  // Policy and gates
  | 'write_policy_checked'
  | 'gate_started'
  | 'gate_passed'
  | 'gate_failed'
  | 'goal_checks_completed'
  | 'goal_check_failed'
  // Stop conditions
  | 'limit_exceeded'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Unique identifier for this run */
  runId?: string;
  /** Current phase id */
  phase?: string;
  /** Entry count of the current phase */
  iteration?: number;
  /** Additional context-specific metadata */
  [key: string]: unknown;
}

/**
 * A structured log event
 */
export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

/**
 * Options for configuring the logger
 */
export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output (for secrets) */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations can write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set the run context (runId, etc.) for all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all logged events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  const order: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };
  return order[a] - order[b];
}

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is emitted at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
      return 'error';
    case 'warn':
    case 'gate_failed':
    case 'goal_check_failed':
    case 'repair_loop':
      return 'warn';
    // A fatal error reaches the user once, as the command's ERROR line
    case 'run_failed':
    case 'worker_invocation_failed':
    case 'control_validation_failed':
    case 'limit_exceeded':
    case 'debug':
    case 'artifact_written':
    case 'write_policy_checked':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Common secret patterns to redact
 * Worker and gate output is logged in places, and either may echo credentials.
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // API keys (generic patterns)
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  // AWS keys
  /(?:AKIA|ABIA|ACCA|ASIA)[A-Z0-9]{16}/g,
  // GitHub tokens
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  // Anthropic API keys
  /sk-ant-[a-zA-Z0-9-_]{40,}/gi,
  // Generic secrets in env vars
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
