import type { IEventBus } from '@agent-exec/core';
import { createLogger, errorMessage } from '@agent-exec/core';
import type { Formatter } from './formatter.js';

const log = createLogger('Display');

/**
 * Background consumer of the event bus. Runs until the bus is closed and
 * drained; a formatter failure is logged and the next event is still shown.
 */
export class Display {
  private consuming: Promise<void> | null = null;

  constructor(
    private readonly bus: Pick<IEventBus, 'subscribe'>,
    private readonly formatter: Formatter,
  ) {}

  start(): void {
    if (this.consuming) {
      throw new Error('Display already started');
    }
    this.consuming = this.consume();
  }

  /** Resolves once every event has been shown and the formatter flushed. */
  async wait(): Promise<void> {
    await this.consuming;
  }

  private async consume(): Promise<void> {
    try {
      for await (const event of this.bus.subscribe()) {
        try {
          this.formatter.format(event);
        } catch (error) {
          log.error(`format error: ${errorMessage(error)}`, { type: event.type });
        }
      }
    } catch (error) {
      log.error(`Event stream failed: ${errorMessage(error)}`);
    } finally {
      this.flush();
    }
  }

  private flush(): void {
    try {
      this.formatter.flush();
    } catch (error) {
      log.error(`flush error: ${errorMessage(error)}`);
    }
  }
}
