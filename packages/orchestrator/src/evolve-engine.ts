import type {
  EvolveConfig,
  EvolveResult,
  IAgentRuntime,
  IEventEmitter,
  IVcsClient,
  PromptOptions,
} from '@agent-exec/core';
import {
  Events,
  InterruptedError,
  InvalidInputError,
  UnparsableJudgementError,
  createLogger,
} from '@agent-exec/core';
import { validateIterations, validatePrompt } from '@agent-exec/agent-runtime';
import { randomBranchName, truncate } from './branch-names.js';
import { InterruptWatcher } from './interrupt-watcher.js';
import type { SignalSource } from './interrupt-watcher.js';
import { buildComparePrompt, parseLoserBranch } from './judge.js';

const log = createLogger('EvolveEngine');

export type TournamentPhase =
  | 'init'
  | 'implemented'
  | 'round-start'
  | 'improved'
  | 'compared'
  | 'updated'
  | 'done';

export interface EvolveDependencies {
  runtime: IAgentRuntime;
  vcs: IVcsClient;
  emitter: IEventEmitter;
  signals?: SignalSource;
  /** Branch name generator; random `impl-xxxxxx` names by default */
  nextBranchName?: () => string;
}

interface Judgement {
  winner: string;
  loser: string;
}

/**
 * Single-elimination tournament over git branches.
 *
 * An initial implementation becomes the first winner. Each round branches a
 * challenger off the winner, lets the assistant improve it, then asks the
 * assistant (from the original branch, so neither candidate is checked out)
 * which of the two should be deleted. The survivor carries into the next
 * round. Every candidate is squashed to a single commit on top of the
 * original branch so the judge compares whole implementations.
 */
export class EvolveEngine {
  private phase: TournamentPhase = 'init';
  private originalBranch = '';
  private winner = '';
  private watcher: InterruptWatcher | null = null;

  constructor(
    private readonly config: EvolveConfig,
    private readonly deps: EvolveDependencies,
  ) {}

  get currentPhase(): TournamentPhase {
    return this.phase;
  }

  get currentWinner(): string {
    return this.winner;
  }

  async run(): Promise<EvolveResult> {
    this.validate();
    const { vcs, emitter } = this.deps;
    const total = this.config.iterations;

    this.originalBranch = await vcs.currentBranch();
    if (this.originalBranch === 'HEAD') {
      throw new InvalidInputError('evolve needs a checked-out branch, but HEAD is detached');
    }
    log.info(`Starting tournament from ${this.originalBranch}`, { rounds: total });

    const watcher = new InterruptWatcher(this.deps.signals);
    this.watcher = watcher;

    try {
      await emitter.emit(Events.EVOLVE_STARTED, { total });
      if (watcher.interrupted) {
        throw await this.interrupt(0);
      }

      await this.guard(0, () => this.implement());

      for (let round = 1; round <= total; round++) {
        if (watcher.interrupted) {
          throw await this.interrupt(round - 1);
        }

        this.transition('round-start');
        await emitter.emit(Events.ROUND_STARTED, { round, total });

        await this.guard(round - 1, async () => {
          const challenger = await this.improve(round);
          const judgement = await this.compare(challenger);
          await this.update(judgement);
        });

        if (round < total && this.config.sleepMs > 0) {
          await emitter.emit(Events.SLEEP_STARTED, { durationMs: this.config.sleepMs });
          if ((await watcher.sleep(this.config.sleepMs)) === 'interrupted') {
            throw await this.interrupt(round);
          }
        }
      }

      this.transition('done');
      await emitter.emit(Events.EVOLVE_COMPLETED, {
        finalBranch: this.winner,
        totalRounds: total,
        totalDurationMs: 0,
      });
      return { finalBranch: this.winner, rounds: total };
    } finally {
      watcher.dispose();
      this.watcher = null;
    }
  }

  private validate(): void {
    const { config } = this;
    validateIterations(config.iterations);
    validatePrompt(config.plan);
    validatePrompt(config.improvePrompt);
    validatePrompt(config.comparePrompt);
    if (!Number.isInteger(config.compareErrorRetries) || config.compareErrorRetries < 0) {
      throw new InvalidInputError('compare error retries must be a non-negative integer');
    }
    if (!Number.isFinite(config.sleepMs) || config.sleepMs < 0) {
      throw new InvalidInputError('sleep must be a non-negative duration');
    }
  }

  /** INIT → IMPLEMENTED: the first candidate, built from the plan. */
  private async implement(): Promise<void> {
    const { vcs } = this.deps;
    const branch = this.nextBranchName();

    await vcs.createBranch(branch);
    await this.execute(this.config.plan, this.config.planOptions);
    await vcs.squashSince(this.originalBranch, `implement: ${truncate(this.config.plan, 50)}`);

    this.winner = branch;
    this.transition('implemented');
  }

  /** ROUND_START → IMPROVED: a challenger forked from the current winner. */
  private async improve(round: number): Promise<string> {
    const { vcs, emitter } = this.deps;
    const challenger = this.nextBranchName();

    await vcs.createBranchFrom(challenger, this.winner);
    await emitter.emit(Events.IMPROVEMENT_STARTED, { branch: challenger });
    await this.execute(this.config.improvePrompt, this.config.improveOptions);
    await vcs.squashSince(this.originalBranch, `improve: round ${round}`);

    this.transition('improved');
    return challenger;
  }

  /** IMPROVED → COMPARED: ask the assistant which candidate to delete. */
  private async compare(challenger: string): Promise<Judgement> {
    const { vcs, emitter } = this.deps;
    const { compareErrorRetries: retries } = this.config;
    const winner = this.winner;

    await emitter.emit(Events.COMPARISON_STARTED, { winner, challenger });
    await vcs.checkout(this.originalBranch);

    const prompt = buildComparePrompt(this.config.comparePrompt, winner, challenger);
    let lastResponse = '';

    for (let attempt = 0; attempt <= retries; attempt++) {
      if (attempt > 0) {
        await emitter.emit(Events.COMPARISON_RETRY, { attempt, maxAttempts: retries });
      }

      lastResponse = await this.execute(prompt, this.config.compareOptions);
      const loser = parseLoserBranch(lastResponse, winner, challenger);
      if (loser !== null) {
        this.transition('compared');
        return { winner: loser === winner ? challenger : winner, loser };
      }
      log.warn(`Could not find a branch name in judge response (attempt ${attempt + 1})`, {
        response: truncate(lastResponse, 200),
      });
    }

    throw new UnparsableJudgementError(
      `failed to parse comparison result after ${retries} retries`,
      retries + 1,
      lastResponse,
    );
  }

  /** COMPARED → UPDATED: keep the survivor, drop the loser. */
  private async update({ winner, loser }: Judgement): Promise<void> {
    const { vcs, emitter } = this.deps;

    await emitter.emit(Events.WINNER_SELECTED, { winner, loser });
    await vcs.checkout(winner);
    if (this.config.debugKeepBranches) {
      log.info(`Keeping eliminated branch ${loser}`);
    } else {
      await vcs.deleteBranch(loser);
    }

    this.winner = winner;
    this.transition('updated');
  }

  private async execute(prompt: string, options: PromptOptions): Promise<string> {
    const result = await this.deps.runtime.execute(prompt, {
      ...options,
      signal: this.watcher?.abortSignal,
    });
    return result.text;
  }

  /** Turn an aborted child into the tournament's single interrupted event. */
  private async guard(completed: number, step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (error) {
      if (error instanceof InterruptedError) {
        throw await this.interrupt(completed);
      }
      throw error;
    }
  }

  private async interrupt(completed: number): Promise<InterruptedError> {
    const total = this.config.iterations;
    await this.deps.emitter.emit(Events.EVOLVE_INTERRUPTED, { completed, total, winner: this.winner });
    return new InterruptedError(`evolve interrupted after ${completed}/${total} rounds`);
  }

  private nextBranchName(): string {
    return (this.deps.nextBranchName ?? randomBranchName)();
  }

  private transition(next: TournamentPhase): void {
    log.debug(`${this.phase} -> ${next}`);
    this.phase = next;
  }
}
