import type { AgentEvent, EventKind } from '@agent-exec/core';
import { ContentFilter } from './content-filter.js';
import { EVENT_RENDERERS } from './event-renderers.js';
import type { EventRenderer, RenderContext } from './event-renderers.js';
import type { Formatter } from './formatter.js';
import { formatClockTime, terminalWidth } from './text.js';
import type { OutputStream } from './text.js';

export interface ConsoleFormatterOptions {
  stream: OutputStream;
  /** Show tool inputs and results in full */
  verbose?: boolean;
  /** Defaults to the stream's column count, or 80 */
  width?: number;
}

/**
 * Human-readable, colored rendering of every event, each as its own block
 * separated by a blank line.
 */
export class ConsoleFormatter implements Formatter {
  private readonly stream: OutputStream;
  private readonly filter: ContentFilter;
  private readonly width: number;

  constructor(options: ConsoleFormatterOptions) {
    this.stream = options.stream;
    this.filter = new ContentFilter(options.verbose ?? false);
    this.width = options.width ?? terminalWidth(options.stream);
  }

  format(event: AgentEvent): void {
    const output = this.render(event);
    this.stream.write(`\n${output}\n`);
  }

  flush(): void {
    // Writes are unbuffered
  }

  /** Render without writing; used by decorators and tests. */
  render<K extends EventKind>(event: AgentEvent<K>): string {
    const ctx: RenderContext = {
      time: `[${formatClockTime(event.timestamp)}] `,
      filter: this.filter,
      width: this.width,
    };
    const renderer: EventRenderer<K> = EVENT_RENDERERS[event.type];
    return renderer(event.payload, ctx);
  }
}
