import { describe, it, expect } from 'vitest';
import type { AgentEvent } from '@agent-exec/core';
import { EventBus } from '../event-bus.js';

async function drain(stream: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
  const events: AgentEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

describe('EventBus', () => {
  describe('emit / subscribe', () => {
    it('delivers events in emit order', async () => {
      const bus = new EventBus();
      const collected = drain(bus.subscribe());

      await bus.emit('loop-started', { total: 2 });
      await bus.emit('iteration-started', { current: 1, total: 2 });
      await bus.emit('iteration-completed', { current: 1, total: 2, durationMs: 5 });
      bus.close();

      const events = await collected;
      expect(events.map((e) => e.type)).toEqual([
        'loop-started',
        'iteration-started',
        'iteration-completed',
      ]);
      expect(events[1].payload).toEqual({ current: 1, total: 2 });
    });

    it('stamps each event with the emission time', async () => {
      const bus = new EventBus();
      const before = Date.now();
      await bus.emit('sleep-started', { durationMs: 1000 });
      bus.close();

      const [event] = await drain(bus.subscribe());
      expect(event.timestamp).toBeInstanceOf(Date);
      expect(event.timestamp.getTime()).toBeGreaterThanOrEqual(before);
    });

    it('buffers events emitted before anyone subscribes', async () => {
      const bus = new EventBus();
      await bus.emit('assistant-text', { text: 'one' });
      await bus.emit('assistant-text', { text: 'two' });
      bus.close();

      const events = await drain(bus.subscribe());
      expect(events.map((e) => e.payload)).toEqual([{ text: 'one' }, { text: 'two' }]);
    });

    it('rejects a second subscriber', () => {
      const bus = new EventBus();
      bus.subscribe();
      expect(() => bus.subscribe()).toThrow('EventBus supports a single subscriber');
    });
  });

  describe('backpressure', () => {
    it('holds emit while the buffer is full', async () => {
      const bus = new EventBus(2);
      await bus.emit('branch-deleted', { name: 'a' });
      await bus.emit('branch-deleted', { name: 'b' });

      let released = false;
      const third = bus.emit('branch-deleted', { name: 'c' }).then(() => {
        released = true;
      });
      await Promise.resolve();
      expect(released).toBe(false);
      expect(bus.pending).toBe(3);

      const iterator = bus.subscribe()[Symbol.asyncIterator]();
      const first = await iterator.next();
      await third;

      expect(first.value?.payload).toEqual({ name: 'a' });
      expect(released).toBe(true);
    });

    it('delivers blocked emits accepted before close', async () => {
      const bus = new EventBus(1);
      await bus.emit('branch-created', { name: 'impl-000001', base: '' });
      const blocked = bus.emit('branch-created', { name: 'impl-000002', base: '' });
      bus.close();
      await blocked;

      const events = await drain(bus.subscribe());
      expect(events.map((e) => e.payload)).toEqual([
        { name: 'impl-000001', base: '' },
        { name: 'impl-000002', base: '' },
      ]);
    });

    it('rejects a non-positive capacity', () => {
      expect(() => new EventBus(0)).toThrow(RangeError);
    });
  });

  describe('close', () => {
    it('drops events emitted after close', async () => {
      const bus = new EventBus();
      await bus.emit('evolve-started', { total: 1 });
      bus.close();
      await bus.emit('evolve-completed', { finalBranch: 'x', totalRounds: 1, totalDurationMs: 0 });

      const events = await drain(bus.subscribe());
      expect(events.map((e) => e.type)).toEqual(['evolve-started']);
    });

    it('is idempotent', () => {
      const bus = new EventBus();
      bus.close();
      expect(() => bus.close()).not.toThrow();
      expect(bus.closed).toBe(true);
    });

    it('ends a consumer that is waiting for events', async () => {
      const bus = new EventBus();
      const collected = drain(bus.subscribe());
      await Promise.resolve();
      bus.close();

      await expect(collected).resolves.toEqual([]);
    });
  });
});
