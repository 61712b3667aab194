// --- Child invoker events ---

export interface RunStartedEvent {
  prompt: string;
  cwd: string;
  /** Value of ANTHROPIC_BASE_URL when set */
  baseUrl?: string;
  /** Entries of the working directory, formatted `[a, b, c]` */
  fileList?: string;
}

export interface AssistantTextEvent {
  text: string;
}

/** Tool input is arbitrary JSON from the child; richer typing is left to consumers. */
export type ToolInput = Record<string, unknown>;

export interface ToolUseEvent {
  name: string;
  input: ToolInput;
}

export interface ToolResultEvent {
  content: string;
}

export interface ExecutionResultEvent {
  durationMs: number;
}

// --- Loop events ---

export interface LoopStartedEvent {
  total: number;
}

export interface IterationStartedEvent {
  current: number;
  total: number;
}

export interface IterationCompletedEvent {
  current: number;
  total: number;
  durationMs: number;
}

export interface IterationFailedEvent {
  current: number;
  total: number;
  error: string;
}

export interface LoopCompletedEvent {
  total: number;
  successful: number;
  failed: number;
  /** Always 0; kept so the payload shape stays stable. */
  totalDurationMs: number;
}

export interface LoopInterruptedEvent {
  completed: number;
  total: number;
}

export interface SleepStartedEvent {
  durationMs: number;
}

// --- Evolve events ---

export interface EvolveStartedEvent {
  total: number;
}

export interface RoundStartedEvent {
  round: number;
  total: number;
}

export interface ImprovementStartedEvent {
  branch: string;
}

export interface ComparisonStartedEvent {
  winner: string;
  challenger: string;
}

export interface ComparisonRetryEvent {
  attempt: number;
  maxAttempts: number;
}

export interface WinnerSelectedEvent {
  winner: string;
  loser: string;
}

export interface EvolveCompletedEvent {
  finalBranch: string;
  totalRounds: number;
  totalDurationMs: number;
}

export interface EvolveInterruptedEvent {
  completed: number;
  total: number;
  winner: string;
}

// --- Git events ---

export interface BranchCreatedEvent {
  name: string;
  /** Empty when the branch was created at HEAD */
  base: string;
}

export interface BranchCheckedOutEvent {
  name: string;
}

export interface BranchDeletedEvent {
  name: string;
}

export interface CommitsSquashedEvent {
  /** The base the commits were squashed against, not the current branch */
  branch: string;
}

export interface EventPayloadMap {
  'run-started': RunStartedEvent;
  'assistant-text': AssistantTextEvent;
  'tool-use': ToolUseEvent;
  'tool-result': ToolResultEvent;
  'execution-result': ExecutionResultEvent;
  'loop-started': LoopStartedEvent;
  'iteration-started': IterationStartedEvent;
  'iteration-completed': IterationCompletedEvent;
  'iteration-failed': IterationFailedEvent;
  'loop-completed': LoopCompletedEvent;
  'loop-interrupted': LoopInterruptedEvent;
  'sleep-started': SleepStartedEvent;
  'evolve-started': EvolveStartedEvent;
  'round-started': RoundStartedEvent;
  'improvement-started': ImprovementStartedEvent;
  'comparison-started': ComparisonStartedEvent;
  'comparison-retry': ComparisonRetryEvent;
  'winner-selected': WinnerSelectedEvent;
  'evolve-completed': EvolveCompletedEvent;
  'evolve-interrupted': EvolveInterruptedEvent;
  'branch-created': BranchCreatedEvent;
  'branch-checked-out': BranchCheckedOutEvent;
  'branch-deleted': BranchDeletedEvent;
  'commits-squashed': CommitsSquashedEvent;
}

export type EventKind = keyof EventPayloadMap;

export const Events = {
  RUN_STARTED: 'run-started',
  ASSISTANT_TEXT: 'assistant-text',
  TOOL_USE: 'tool-use',
  TOOL_RESULT: 'tool-result',
  EXECUTION_RESULT: 'execution-result',
  LOOP_STARTED: 'loop-started',
  ITERATION_STARTED: 'iteration-started',
  ITERATION_COMPLETED: 'iteration-completed',
  ITERATION_FAILED: 'iteration-failed',
  LOOP_COMPLETED: 'loop-completed',
  LOOP_INTERRUPTED: 'loop-interrupted',
  SLEEP_STARTED: 'sleep-started',
  EVOLVE_STARTED: 'evolve-started',
  ROUND_STARTED: 'round-started',
  IMPROVEMENT_STARTED: 'improvement-started',
  COMPARISON_STARTED: 'comparison-started',
  COMPARISON_RETRY: 'comparison-retry',
  WINNER_SELECTED: 'winner-selected',
  EVOLVE_COMPLETED: 'evolve-completed',
  EVOLVE_INTERRUPTED: 'evolve-interrupted',
  BRANCH_CREATED: 'branch-created',
  BRANCH_CHECKED_OUT: 'branch-checked-out',
  BRANCH_DELETED: 'branch-deleted',
  COMMITS_SQUASHED: 'commits-squashed',
} as const satisfies Record<string, EventKind>;

/** A timestamped event as it travels over the bus. */
export interface AgentEvent<K extends EventKind = EventKind> {
  type: K;
  timestamp: Date;
  payload: EventPayloadMap[K];
}

/** Narrow an event to a single kind. */
export function isEvent<K extends EventKind>(event: AgentEvent, type: K): event is AgentEvent<K> {
  return event.type === type;
}
