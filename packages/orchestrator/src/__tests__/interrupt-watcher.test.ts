import { EventEmitter } from 'node:events';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { InterruptWatcher, MAX_TIMER_DELAY } from '../interrupt-watcher.js';

describe('InterruptWatcher', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts uninterrupted and listens for SIGINT and SIGTERM', () => {
    const source = new EventEmitter();
    const watcher = new InterruptWatcher(source);

    expect(watcher.interrupted).toBe(false);
    expect(watcher.abortSignal.aborted).toBe(false);
    expect(source.listenerCount('SIGINT')).toBe(1);
    expect(source.listenerCount('SIGTERM')).toBe(1);
    watcher.dispose();
  });

  it('marks the first signal without aborting', () => {
    const source = new EventEmitter();
    const watcher = new InterruptWatcher(source);

    source.emit('SIGTERM', 'SIGTERM');

    expect(watcher.interrupted).toBe(true);
    expect(watcher.abortSignal.aborted).toBe(false);
    watcher.dispose();
  });

  it('aborts on the second signal', () => {
    const source = new EventEmitter();
    const watcher = new InterruptWatcher(source);
    const onAbort = vi.fn();
    watcher.abortSignal.addEventListener('abort', onAbort);

    source.emit('SIGINT', 'SIGINT');
    source.emit('SIGINT', 'SIGINT');
    source.emit('SIGINT', 'SIGINT');

    expect(watcher.abortSignal.aborted).toBe(true);
    expect(onAbort).toHaveBeenCalledTimes(1);
    watcher.dispose();
  });

  it('lets a sleep elapse when nothing arrives', async () => {
    vi.useFakeTimers();
    const watcher = new InterruptWatcher(new EventEmitter());

    const outcome = watcher.sleep(5_000);
    await vi.advanceTimersByTimeAsync(5_000);

    await expect(outcome).resolves.toBe('elapsed');
    watcher.dispose();
  });

  it('keeps sleeping past the longest single timer delay', async () => {
    vi.useFakeTimers();
    const watcher = new InterruptWatcher(new EventEmitter());
    const twentyFiveDays = 25 * 24 * 3_600_000;
    let outcome: string | undefined;

    const pending = watcher.sleep(twentyFiveDays).then((result) => {
      outcome = result;
    });
    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY);
    expect(outcome).toBeUndefined();

    await vi.advanceTimersByTimeAsync(twentyFiveDays - MAX_TIMER_DELAY);
    await pending;
    expect(outcome).toBe('elapsed');
    watcher.dispose();
  });

  it('wakes a sleep early on the first signal', async () => {
    vi.useFakeTimers();
    const source = new EventEmitter();
    const watcher = new InterruptWatcher(source);

    const outcome = watcher.sleep(60_000);
    await vi.advanceTimersByTimeAsync(1_000);
    source.emit('SIGINT', 'SIGINT');

    await expect(outcome).resolves.toBe('interrupted');
    expect(vi.getTimerCount()).toBe(0);
    watcher.dispose();
  });

  it('does not sleep once interrupted', async () => {
    const source = new EventEmitter();
    const watcher = new InterruptWatcher(source);
    source.emit('SIGINT', 'SIGINT');

    await expect(watcher.sleep(60_000)).resolves.toBe('interrupted');
    watcher.dispose();
  });

  it('removes its listeners and releases sleepers on dispose', async () => {
    const source = new EventEmitter();
    const watcher = new InterruptWatcher(source);
    const outcome = watcher.sleep(60_000);

    watcher.dispose();
    watcher.dispose();

    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
    await expect(outcome).resolves.toBe('interrupted');
  });

  it('watches only the signals it was given', () => {
    const source = new EventEmitter();
    const watcher = new InterruptWatcher(source, ['SIGINT']);

    source.emit('SIGTERM', 'SIGTERM');

    expect(watcher.interrupted).toBe(false);
    watcher.dispose();
  });
});
