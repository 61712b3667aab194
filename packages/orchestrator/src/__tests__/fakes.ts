import type {
  EventKind,
  EventPayloadMap,
  ExecutionOptions,
  ExecutionResult,
  IAgentRuntime,
  IEventEmitter,
  RuntimeMetadata,
} from '@agent-exec/core';
import type { GitRunner } from '../git-utils.js';

export interface RecordedEvent {
  type: EventKind;
  payload: unknown;
}

/** Keeps every event in order; `onEmit` lets a test react to a specific one. */
export class RecordingEmitter implements IEventEmitter {
  readonly events: RecordedEvent[] = [];
  onEmit: ((type: EventKind) => void) | undefined;

  async emit<K extends EventKind>(type: K, payload: EventPayloadMap[K]): Promise<void> {
    this.events.push({ type, payload });
    this.onEmit?.(type);
  }

  types(): EventKind[] {
    return this.events.map((e) => e.type);
  }

  count(type: EventKind): number {
    return this.events.filter((e) => e.type === type).length;
  }

  payloadsOf(type: EventKind): unknown[] {
    return this.events.filter((e) => e.type === type).map((e) => e.payload);
  }
}

export type Responder = (prompt: string, options: ExecutionOptions) => string | Promise<string>;

/** Runtime that answers from a script instead of spawning anything. */
export class FakeRuntime implements IAgentRuntime {
  readonly runtimeId = 'fake';
  readonly metadata: RuntimeMetadata = {
    id: 'fake',
    displayName: 'Fake',
    cliCommand: 'fake',
    installHint: 'none',
  };
  readonly calls: Array<{ prompt: string; options: ExecutionOptions }> = [];

  constructor(private readonly respond: Responder = () => '') {}

  async execute(prompt: string, options: ExecutionOptions = {}): Promise<ExecutionResult> {
    this.calls.push({ prompt, options });
    return { text: await this.respond(prompt, options) };
  }
}

export function defaultGitResponse(args: string[]): string {
  if (args[0] === 'rev-parse') return 'main';
  if (args[0] === 'merge-base') return '0123456789abcdef';
  return '';
}

/** Records git invocations; `respond` may throw to simulate a failing command. */
export class FakeGit {
  readonly commands: string[][] = [];

  constructor(private readonly respond: (args: string[]) => string = defaultGitResponse) {}

  readonly run: GitRunner = async (_repoDir, args) => {
    this.commands.push(args);
    return this.respond(args);
  };
}

/** Hands out the given names in order. */
export function sequentialNames(...names: string[]): () => string {
  let index = 0;
  return () => {
    const name = names[index];
    index += 1;
    if (name === undefined) throw new Error('ran out of branch names');
    return name;
  };
}
