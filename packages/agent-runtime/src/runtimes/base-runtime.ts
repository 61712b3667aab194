import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import type {
  IAgentRuntime,
  IEventEmitter,
  ExecutionResult,
  ExecutionOptions,
  RuntimeMetadata,
} from '@agent-exec/core';
import {
  ChildFailureError,
  Events,
  InterruptedError,
  createLogger,
  errorMessage,
} from '@agent-exec/core';
import treeKill from 'tree-kill';
import { buildChildEnv, describeWorkingDirectory } from '../utils.js';
import { validatePrompt } from '../validation.js';
import type { OutputStrategy } from './output-strategy.js';

const log = createLogger('BaseAgentRuntime');

/** The parts of a spawned child the runtime relies on. `ChildProcess` satisfies it. */
export interface SpawnedChild {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/** Consumes complete stdout records and accumulates the final answer. */
export interface StreamLineHandler {
  readonly finalText: string;
  handleLine(line: string): Promise<void>;
}

export interface RuntimeOptions {
  emitter: IEventEmitter;
  /** Working directory of the child; defaults to process.cwd() */
  cwd?: string;
  /** Environment of the child; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

function waitForExit(child: SpawnedChild): Promise<ChildExit> {
  return new Promise((resolve) => {
    child.on('error', (error) => {
      // A child that never started has nothing left to read.
      child.stdout?.destroy();
      resolve({ code: null, signal: null, error });
    });
    child.on('close', (code, signal) => resolve({ code, signal }));
  });
}

/**
 * Abstract base class for agent runtimes using the Template Method pattern.
 * Owns the shared execute() lifecycle (validate, announce, spawn, stream,
 * abort, exit status). Subclasses provide the command, its args, the stdout
 * framing and the frame handling.
 */
export abstract class BaseAgentRuntime implements IAgentRuntime {
  abstract readonly runtimeId: string;
  abstract readonly metadata: RuntimeMetadata;

  protected readonly emitter: IEventEmitter;
  protected readonly cwd: string;
  protected readonly env: NodeJS.ProcessEnv;

  constructor(options: RuntimeOptions) {
    this.emitter = options.emitter;
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  // --- Template method hooks ---

  /** CLI command to execute (e.g., 'claude') */
  protected abstract getCommand(): string;

  /** Build CLI args for one execution */
  protected abstract buildExecuteArgs(prompt: string, options: ExecutionOptions): string[];

  /** Create the framing strategy for stdout */
  protected abstract createOutputStrategy(): OutputStrategy;

  /** Create the handler that turns stdout records into events */
  protected abstract createLineHandler(): StreamLineHandler;

  /**
   * Spawn the child. Extracted as a hook so tests can substitute a scripted
   * process. The child runs in its own process group so a terminal Ctrl-C
   * reaches only this process; stopping the child is an explicit abort.
   */
  protected spawnProcess(
    command: string,
    args: string[],
    options: { cwd: string; env: Record<string, string> },
  ): SpawnedChild {
    return spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'inherit'],
      detached: true,
    });
  }

  /** Concrete execute(): shared lifecycle across runtimes */
  async execute(prompt: string, options: ExecutionOptions = {}): Promise<ExecutionResult> {
    validatePrompt(prompt);
    if (options.signal?.aborted) {
      throw new InterruptedError();
    }

    const baseUrl = this.env.ANTHROPIC_BASE_URL;
    await this.emitter.emit(Events.RUN_STARTED, {
      prompt,
      cwd: this.cwd,
      ...(baseUrl ? { baseUrl } : {}),
      fileList: await describeWorkingDirectory(this.cwd),
    });

    const command = this.getCommand();
    const args = this.buildExecuteArgs(prompt, options);
    log.debug(`Executing: ${command} ${args.join(' ').slice(0, 80)}`);

    const child = this.spawnProcess(command, args, { cwd: this.cwd, env: buildChildEnv(this.env) });
    const exited = waitForExit(child);

    // Abort signal support: kill the entire process tree
    let aborted = false;
    const abortHandler = () => {
      aborted = true;
      if (!child.pid) return;
      log.warn(`Aborting ${command} (pid ${child.pid})`);
      treeKill(child.pid, 'SIGTERM', (err) => {
        if (err) log.error(`Failed to kill ${command}: ${err.message}`);
      });
    };
    options.signal?.addEventListener('abort', abortHandler, { once: true });
    // An abort during run-started or the directory listing fires no event
    if (options.signal?.aborted) abortHandler();

    const handler = this.createLineHandler();
    let streamError: unknown;
    try {
      await this.pumpStdout(child, handler);
    } catch (error) {
      // Stop reading but still reap the child before reporting.
      streamError = error;
    }

    const exit = await exited;
    options.signal?.removeEventListener('abort', abortHandler);

    if (exit.error) {
      log.error(`Spawn error: ${exit.error.message}`);
      throw new ChildFailureError(
        `failed to run ${command}: ${exit.error.message} (install with: ${this.metadata.installHint})`,
        null,
        null,
        { cause: exit.error },
      );
    }
    if (aborted) {
      throw new InterruptedError(`${command} was aborted`);
    }
    if (streamError !== undefined) {
      log.error(`Stream error: ${errorMessage(streamError)}`);
      throw streamError;
    }
    if (exit.code !== 0) {
      const reason = exit.code === null
        ? `${command} was terminated by ${exit.signal ?? 'a signal'}`
        : `${command} exited with status ${exit.code}`;
      throw new ChildFailureError(reason, exit.code, exit.signal);
    }

    log.debug(`Execute complete: ${handler.finalText.length} chars`);
    return { text: handler.finalText };
  }

  private async pumpStdout(child: SpawnedChild, handler: StreamLineHandler): Promise<void> {
    const stdout = child.stdout;
    if (!stdout) {
      throw new ChildFailureError(`${this.getCommand()} has no stdout pipe`, null);
    }

    stdout.setEncoding('utf8');
    const strategy = this.createOutputStrategy();
    for await (const chunk of stdout) {
      for (const line of strategy.processChunk(String(chunk))) {
        await handler.handleLine(line);
      }
    }
    for (const line of strategy.flush()) {
      await handler.handleLine(line);
    }
  }
}
