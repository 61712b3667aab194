import type { IAgentRuntime, IEventEmitter, IVcsClient, PromptOptions } from '@agent-exec/core';
import {
  ExitCodes,
  InterruptedError,
  createLogger,
  errorMessage,
  setLogLevel,
} from '@agent-exec/core';
import { ClaudeCodeRuntime } from '@agent-exec/agent-runtime';
import { ConsoleFormatter, Display, StatusLineFormatter } from '@agent-exec/display';
import type { Formatter, OutputStream } from '@agent-exec/display';
import { EventBus } from '@agent-exec/eventbus';
import { EvolveEngine, GitClient, LoopRunner } from '@agent-exec/orchestrator';
import type { SignalSource } from '@agent-exec/orchestrator';
import { resolveConfig, toEvolveConfig } from './config.js';
import type { AgentExecConfig, CliOptions, CommandName } from './config.js';

const log = createLogger('Session');

export interface SessionIO {
  stdout: OutputStream;
  stderr: { write(chunk: string): unknown };
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Interrupt signals; the process by default */
  signals?: SignalSource;
}

export interface SessionServices {
  runtime: IAgentRuntime;
  vcs: IVcsClient;
}

export type ServiceFactory = (emitter: IEventEmitter, io: SessionIO) => SessionServices;

export const createDefaultServices: ServiceFactory = (emitter, io) => ({
  runtime: new ClaudeCodeRuntime({ emitter, cwd: io.cwd, env: io.env }),
  vcs: new GitClient(io.cwd, emitter),
});

export function processIO(): SessionIO {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env,
  };
}

function createFormatter(config: AgentExecConfig, io: SessionIO): Formatter {
  const consoleFormatter = new ConsoleFormatter({ stream: io.stdout, verbose: config.verbose });
  if (!config.statusLine) return consoleFormatter;
  return new StatusLineFormatter(consoleFormatter, {
    stream: io.stdout,
    cwd: io.cwd,
    baseUrl: io.env.ANTHROPIC_BASE_URL,
  });
}

async function runCommand(
  command: CommandName,
  prompt: string,
  config: AgentExecConfig,
  services: SessionServices,
  emitter: IEventEmitter,
  signals: SignalSource | undefined,
): Promise<void> {
  const { runtime, vcs } = services;

  if (command === 'evolve') {
    const engine = new EvolveEngine(toEvolveConfig(prompt, config), { runtime, vcs, emitter, signals });
    const result = await engine.run();
    log.info(`Tournament finished on ${result.finalBranch}`);
    return;
  }

  const promptOptions: PromptOptions = {
    systemPrompt: config.systemPrompt,
    appendSystemPrompt: config.appendSystemPrompt,
  };
  const runner = new LoopRunner(
    { prompt, iterations: config.iterations, sleepMs: config.sleepMs, promptOptions },
    { runtime, emitter, signals },
  );
  const summary = await runner.run();
  log.info(`Loop finished: ${summary.successful}/${summary.total} successful`);
}

function exitCodeFor(failure: unknown, io: SessionIO): number {
  if (failure === undefined) return ExitCodes.SUCCESS;
  if (failure instanceof InterruptedError) return ExitCodes.INTERRUPTED;
  io.stderr.write(`Error: ${errorMessage(failure)}\n`);
  return ExitCodes.FAILURE;
}

/**
 * Run one command against a resolved config: wire the bus, display and
 * services, run the controller, then drain the display before reporting.
 */
export async function runSession(
  command: CommandName,
  prompt: string,
  config: AgentExecConfig,
  io: SessionIO,
  createServices: ServiceFactory = createDefaultServices,
): Promise<number> {
  setLogLevel(config.logLevel);

  const bus = new EventBus();
  const display = new Display(bus, createFormatter(config, io));
  display.start();

  let failure: unknown;
  try {
    await runCommand(command, prompt, config, createServices(bus, io), bus, io.signals);
  } catch (error) {
    failure = error;
  }

  bus.close();
  await display.wait();
  return exitCodeFor(failure, io);
}

/** Resolve flags against the config file, then run. Returns the exit code. */
export async function executeCommand(
  command: CommandName,
  prompt: string,
  cli: CliOptions,
  io: SessionIO,
  createServices?: ServiceFactory,
): Promise<number> {
  let config: AgentExecConfig;
  try {
    config = resolveConfig(command, cli, io.cwd, io.env);
  } catch (error) {
    return exitCodeFor(error, io);
  }
  return runSession(command, prompt, config, io, createServices);
}
