export type ErrorKind =
  | 'invalid-input'
  | 'child-failure'
  | 'protocol-parse'
  | 'unparsable-judgement'
  | 'vcs-failure'
  | 'interrupted';

/**
 * Base class for every failure the orchestration layer raises.
 * `kind` lets callers switch on the failure without instanceof chains.
 */
export class AgentExecError extends Error {
  constructor(
    message: string,
    readonly kind: ErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected arguments: empty prompts, non-positive iteration counts. */
export class InvalidInputError extends AgentExecError {
  constructor(message: string) {
    super(message, 'invalid-input');
  }
}

/** The assistant process could not be started or exited unsuccessfully. */
export class ChildFailureError extends AgentExecError {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly signal: string | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, 'child-failure', options);
  }
}

/** A stdout line from the assistant was not a valid stream-json frame. */
export class ProtocolParseError extends AgentExecError {
  constructor(
    message: string,
    readonly line: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'protocol-parse', options);
  }
}

export class UnparsableJudgementError extends AgentExecError {
  constructor(
    message: string,
    readonly attempts: number,
    readonly lastResponse: string,
  ) {
    super(message, 'unparsable-judgement');
  }
}

/** A git command exited non-zero; `output` holds its combined stdout and stderr. */
export class VcsError extends AgentExecError {
  constructor(
    readonly command: readonly string[],
    readonly output: string,
    options?: { cause?: unknown },
  ) {
    const trimmed = output.trim();
    super(
      trimmed ? `git ${command.join(' ')} failed: ${trimmed}` : `git ${command.join(' ')} failed`,
      'vcs-failure',
      options,
    );
  }
}

export class InterruptedError extends AgentExecError {
  constructor(message = 'interrupted') {
    super(message, 'interrupted');
  }
}

export function isAgentExecError(error: unknown): error is AgentExecError {
  return error instanceof AgentExecError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
