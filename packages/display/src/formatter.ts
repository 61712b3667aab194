import type { AgentEvent } from '@agent-exec/core';

/** Turns bus events into terminal output. */
export interface Formatter {
  format(event: AgentEvent): void;
  /** Called once after the last event */
  flush(): void;
}
