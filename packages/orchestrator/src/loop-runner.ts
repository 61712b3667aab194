import type { IAgentRuntime, IEventEmitter, LoopSummary, PromptOptions } from '@agent-exec/core';
import { Events, InterruptedError, createLogger, errorMessage } from '@agent-exec/core';
import { validateIterations, validatePrompt } from '@agent-exec/agent-runtime';
import { InterruptWatcher } from './interrupt-watcher.js';
import type { SignalSource } from './interrupt-watcher.js';

const log = createLogger('LoopRunner');

export interface LoopOptions {
  prompt: string;
  iterations: number;
  sleepMs: number;
  promptOptions?: PromptOptions;
}

export interface LoopDependencies {
  runtime: IAgentRuntime;
  emitter: IEventEmitter;
  /** Where interrupt signals come from; defaults to the process */
  signals?: SignalSource;
}

/**
 * Runs the same prompt a fixed number of times. A failed iteration is
 * reported and the loop moves on; only an interrupt ends it early.
 */
export class LoopRunner {
  constructor(
    private readonly options: LoopOptions,
    private readonly deps: LoopDependencies,
  ) {}

  async run(): Promise<LoopSummary> {
    const { prompt, iterations: total, sleepMs, promptOptions } = this.options;
    validateIterations(total);
    validatePrompt(prompt);

    const { runtime, emitter } = this.deps;
    const watcher = new InterruptWatcher(this.deps.signals);
    let failed = 0;

    try {
      await emitter.emit(Events.LOOP_STARTED, { total });

      for (let current = 1; current <= total; current++) {
        if (watcher.interrupted) {
          throw await this.interrupt(current - 1);
        }

        await emitter.emit(Events.ITERATION_STARTED, { current, total });
        const startedAt = Date.now();

        try {
          await runtime.execute(prompt, { ...promptOptions, signal: watcher.abortSignal });
          await emitter.emit(Events.ITERATION_COMPLETED, {
            current,
            total,
            durationMs: Date.now() - startedAt,
          });
        } catch (error) {
          if (error instanceof InterruptedError) {
            throw await this.interrupt(current - 1);
          }
          failed += 1;
          log.warn(`Iteration ${current}/${total} failed: ${errorMessage(error)}`);
          await emitter.emit(Events.ITERATION_FAILED, { current, total, error: errorMessage(error) });
        }

        if (current < total && sleepMs > 0) {
          await emitter.emit(Events.SLEEP_STARTED, { durationMs: sleepMs });
          if ((await watcher.sleep(sleepMs)) === 'interrupted') {
            throw await this.interrupt(current);
          }
        }
      }

      const summary: LoopSummary = { total, successful: total - failed, failed };
      await emitter.emit(Events.LOOP_COMPLETED, { ...summary, totalDurationMs: 0 });
      return summary;
    } finally {
      watcher.dispose();
    }
  }

  private async interrupt(completed: number): Promise<InterruptedError> {
    const total = this.options.iterations;
    await this.deps.emitter.emit(Events.LOOP_INTERRUPTED, { completed, total });
    return new InterruptedError(`loop interrupted after ${completed}/${total} iterations`);
  }
}
