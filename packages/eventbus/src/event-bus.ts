import type { AgentEvent, EventKind, EventPayloadMap, IEventBus } from '@agent-exec/core';
import { EVENT_BUFFER_SIZE, createLogger } from '@agent-exec/core';

const log = createLogger('EventBus');

interface BlockedEmit {
  event: AgentEvent;
  resolve: () => void;
}

/**
 * Bounded FIFO between the controllers and the single display consumer.
 *
 * `emit` resolves as soon as the event is buffered or handed over. While the
 * buffer is full it stays pending, which is how a slow consumer throttles
 * the controllers. After `close()` new events are dropped, but everything
 * accepted before the close still reaches the consumer.
 */
export class EventBus implements IEventBus {
  private readonly buffer: AgentEvent[] = [];
  private readonly blocked: BlockedEmit[] = [];
  private waiting: ((event: AgentEvent | null) => void) | null = null;
  private subscribed = false;
  private isClosed = false;

  constructor(private readonly capacity = EVENT_BUFFER_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`EventBus capacity must be a positive integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of events waiting for the consumer */
  get pending(): number {
    return this.buffer.length + this.blocked.length;
  }

  async emit<K extends EventKind>(type: K, payload: EventPayloadMap[K]): Promise<void> {
    if (this.isClosed) {
      log.debug(`Dropped ${type} after close`);
      return;
    }

    const event: AgentEvent<K> = { type, timestamp: new Date(), payload };

    if (this.waiting) {
      const deliver = this.waiting;
      this.waiting = null;
      deliver(event);
      return;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(event);
      return;
    }

    await new Promise<void>((resolve) => {
      this.blocked.push({ event, resolve });
    });
  }

  subscribe(): AsyncIterable<AgentEvent> {
    if (this.subscribed) {
      throw new Error('EventBus supports a single subscriber');
    }
    this.subscribed = true;
    return this.stream();
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    // Emits already waiting on a full buffer were accepted before the close.
    for (const { event, resolve } of this.blocked.splice(0)) {
      this.buffer.push(event);
      resolve();
    }

    if (this.waiting) {
      const wake = this.waiting;
      this.waiting = null;
      wake(null);
    }
  }

  private async *stream(): AsyncGenerator<AgentEvent> {
    while (true) {
      const next = this.buffer.shift();
      if (next !== undefined) {
        this.admitBlocked();
        yield next;
        continue;
      }

      if (this.isClosed) return;

      const event = await new Promise<AgentEvent | null>((resolve) => {
        this.waiting = resolve;
      });
      if (event === null) return;
      yield event;
    }
  }

  private admitBlocked(): void {
    const entry = this.blocked.shift();
    if (!entry) return;
    this.buffer.push(entry.event);
    entry.resolve();
  }
}
