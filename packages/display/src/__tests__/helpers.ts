import type { AgentEvent, EventKind, EventPayloadMap } from '@agent-exec/core';
import type { Formatter } from '../formatter.js';
import type { OutputStream } from '../text.js';

/** 09:05:07 local time */
export const AT = new Date(2026, 0, 2, 9, 5, 7);

export function makeEvent<K extends EventKind>(
  type: K,
  payload: EventPayloadMap[K],
  timestamp = AT,
): AgentEvent<K> {
  return { type, timestamp, payload };
}

export class MemoryStream implements OutputStream {
  readonly chunks: string[] = [];

  constructor(
    readonly isTTY = false,
    readonly columns?: number,
  ) {}

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get output(): string {
    return this.chunks.join('');
  }
}

/** Writes a marker per event so ordering around the status block is visible. */
export class MarkerFormatter implements Formatter {
  flushed = 0;

  constructor(private readonly stream: OutputStream) {}

  format(event: AgentEvent): void {
    this.stream.write(`<${event.type}>\n`);
  }

  flush(): void {
    this.flushed += 1;
  }
}
