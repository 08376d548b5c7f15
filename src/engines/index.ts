/**
 * Engines module - process execution and the worker CLI
 */

// ProcessRunner implementations
export { RealProcessRunner, createRealProcessRunner, TIMEOUT_EXIT_CODE } from './real-process-runner';
export { MockProcessRunner, createMockProcessRunner, formatCommandLine } from './mock-process-runner';
export type { MockProcessConfig, MockProcessHandler, MockProcessCall } from './mock-process-runner';

// Worker invocation
export { WorkerInvoker, createWorkerInvoker, formatWorkerOutput } from './worker-invoker';
export type {
  WorkerRequest,
  WorkerInvocation,
  WorkerInvokerDependencies,
  WorkerInvokeError,
} from './worker-invoker';
