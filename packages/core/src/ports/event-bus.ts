import type { AgentEvent, EventKind, EventPayloadMap } from '../events/index.js';

/** Write side of the bus, handed to every producer. */
export interface IEventEmitter {
  /** Resolves once the event is queued. Events emitted after close are dropped. */
  emit<K extends EventKind>(type: K, payload: EventPayloadMap[K]): Promise<void>;
}

export interface IEventBus extends IEventEmitter {
  readonly closed: boolean;
  /** The single consumer stream; ends after close once buffered events drain. */
  subscribe(): AsyncIterable<AgentEvent>;
  close(): void;
}
