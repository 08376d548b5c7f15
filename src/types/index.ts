/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr } from './result';

// Error taxonomy
export type {
  RunErrorCode,
  RunErrorLocation,
  WorkerFailureReason,
  SchemaViolation,
  IterationLimitKind,
} from './errors';
export {
  RunError,
  ConfigurationError,
  WorkerError,
  ExtractionError,
  SchemaValidationError,
  WritePolicyViolation,
  IterationLimitExceeded,
  ArtifactError,
  MAX_REPORTED_VIOLATIONS,
  isRunError,
} from './errors';

// Exit codes
export { ExitCode, exitCodeForError, getExitCodeDescription } from './exit-codes';

// Process runner interface
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';

// File system interface
export type { FileSystem, WriteOptions, FileSystemError, FileSystemErrorCode } from './file-system';
export { createFileSystemError } from './file-system';

// Clock interface
export type { Clock } from './clock';
export { SystemClock, MockClock, formatRunId } from './clock';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  DEFAULT_REDACT_PATTERNS,
  redactSecrets,
} from './logger';

// Workflow configuration
export type {
  PhaseSpec,
  IterationLimits,
  WritePolicy,
  GateConfig,
  WorkerConfig,
  VerbosityConfig,
  PathConfig,
  ConfigSource,
  WorkflowConfig,
} from './workflow-config';
export {
  VERIFY_PHASE_ID,
  IMPLEMENT_PHASE_ID,
  DEFAULT_LIMITS,
  DEFAULT_WRITE_POLICY,
  DEFAULT_WORKER,
  DEFAULT_WORKFLOW_PATH,
  findPhaseIndex,
} from './workflow-config';

// Control objects
export type {
  JsonValue,
  ControlObject,
  GateCheckResult,
  GateReport,
  GoalCheckCategory,
  GoalCheck,
  GoalCheckReport,
  VerifyEvidence,
  VerifyControl,
} from './control';
export { isControlObject, getNarration } from './control';
