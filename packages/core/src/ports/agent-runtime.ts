import type { PromptOptions } from '../models/prompt.js';

/** Options for one execution of the assistant */
export interface ExecutionOptions extends PromptOptions {
  /** Aborting kills the child's process tree */
  signal?: AbortSignal;
}

export interface ExecutionResult {
  /** Last non-empty `result` frame, or empty when none arrived */
  text: string;
}

/** Self-describing metadata for a runtime, used in diagnostics */
export interface RuntimeMetadata {
  id: string;
  displayName: string;
  cliCommand: string;
  installHint: string;
}

export interface IAgentRuntime {
  readonly runtimeId: string;
  readonly metadata: RuntimeMetadata;

  /**
   * Run one prompt to completion, emitting stream events along the way.
   * Rejects with InvalidInputError, ChildFailureError, ProtocolParseError
   * or InterruptedError.
   */
  execute(prompt: string, options?: ExecutionOptions): Promise<ExecutionResult>;
}
