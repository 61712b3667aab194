// Events
export * from './events/index.js';

// Models
export type { PromptOptions } from './models/prompt.js';
export type { EvolveConfig, EvolveResult, LoopSummary } from './models/evolve.js';

// Ports
export type {
  IAgentRuntime,
  ExecutionOptions,
  ExecutionResult,
  RuntimeMetadata,
} from './ports/agent-runtime.js';
export type { IEventEmitter, IEventBus } from './ports/event-bus.js';
export type { IVcsClient } from './ports/vcs-client.js';

// Errors
export {
  AgentExecError,
  InvalidInputError,
  ChildFailureError,
  ProtocolParseError,
  UnparsableJudgementError,
  VcsError,
  InterruptedError,
  isAgentExecError,
  errorMessage,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Logger
export {
  createLogger,
  addLogTransport,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  consoleTransport,
  redactSecrets,
} from './logger.js';
export type { Logger, LogLevel, LogEntry, LogTransport } from './logger.js';

export * from './constants.js';
