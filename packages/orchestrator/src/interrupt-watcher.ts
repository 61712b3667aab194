import type { EventEmitter } from 'node:events';
import { createLogger } from '@agent-exec/core';

const log = createLogger('InterruptWatcher');

export type InterruptSignal = 'SIGINT' | 'SIGTERM';

/** Anything signals can be observed on. `process` is the default. */
export type SignalSource = Pick<EventEmitter, 'on' | 'off'>;

export type SleepOutcome = 'elapsed' | 'interrupted';

/** Longest delay setTimeout honours (2^31 - 1 ms) */
export const MAX_TIMER_DELAY = 2_147_483_647;

const DEFAULT_SIGNALS: readonly InterruptSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Process-wide interrupt observer, owned by one controller run.
 *
 * The first signal only raises `interrupted`; controllers notice it at their
 * next suspension point and the running child finishes undisturbed. A second
 * signal aborts `abortSignal`, which the runtime answers by killing the child.
 */
export class InterruptWatcher {
  private signalCount = 0;
  private readonly abortController = new AbortController();
  private readonly sleepers = new Set<() => void>();
  private disposed = false;

  constructor(
    private readonly source: SignalSource = process,
    private readonly signals: readonly InterruptSignal[] = DEFAULT_SIGNALS,
  ) {
    for (const signal of this.signals) {
      this.source.on(signal, this.onSignal);
    }
  }

  get interrupted(): boolean {
    return this.signalCount > 0;
  }

  /** Aborted on the second signal */
  get abortSignal(): AbortSignal {
    return this.abortController.signal;
  }

  /** Wait `ms`, returning early if a signal arrives (or already has). */
  sleep(ms: number): Promise<SleepOutcome> {
    if (this.interrupted) return Promise.resolve('interrupted');

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      let remaining = ms;
      const wake = () => {
        clearTimeout(timer);
        this.sleepers.delete(wake);
        resolve('interrupted');
      };
      // Timers longer than MAX_TIMER_DELAY fire at once, so wait in slices
      const arm = () => {
        const delay = Math.min(remaining, MAX_TIMER_DELAY);
        remaining -= delay;
        timer = setTimeout(() => {
          if (remaining > 0) {
            arm();
            return;
          }
          this.sleepers.delete(wake);
          resolve('elapsed');
        }, delay);
      };
      this.sleepers.add(wake);
      arm();
    });
  }

  /** Remove signal listeners. Pending sleeps resolve as interrupted. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const signal of this.signals) {
      this.source.off(signal, this.onSignal);
    }
    this.wakeSleepers();
  }

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.signalCount += 1;
    if (this.signalCount === 1) {
      log.warn(`${signal} received, stopping after the current step (repeat to abort it)`);
      this.wakeSleepers();
    } else if (!this.abortController.signal.aborted) {
      log.warn(`${signal} received again, aborting the running assistant`);
      this.abortController.abort();
    }
  };

  private wakeSleepers(): void {
    for (const wake of [...this.sleepers]) {
      wake();
    }
  }
}
